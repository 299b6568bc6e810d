import { z } from 'zod';

export const MINER_STATE_VERSION = 1;

export const MinerClusterSchema = z.object({
  id: z.number().int().positive(),
  /** Leading-token branch the cluster lives under within its length bucket. */
  route: z.string(),
  tokens: z.array(z.string()),
  support: z.number().int().positive(),
});

export const TemplateMinerSnapshotSchema = z
  .object({
    version: z.literal(MINER_STATE_VERSION),
    clusters: z.array(MinerClusterSchema),
  })
  .superRefine((snapshot, ctx) => {
    snapshot.clusters.forEach((cluster, i) => {
      if (cluster.id !== i + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['clusters', i, 'id'],
          message: `Expected cluster id ${String(i + 1)}, got ${String(cluster.id)}`,
        });
      }
    });
  });

export type MinerCluster = z.infer<typeof MinerClusterSchema>;
export type TemplateMinerSnapshot = z.infer<typeof TemplateMinerSnapshotSchema>;
