import { z } from 'zod';

/**
 * Batches travel as column-oriented JSON tables: one object per column, each
 * mapping a row key ("0", "1", ...) to that row's value. Row-oriented arrays
 * are accepted on input too.
 */
const DocumentIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

const column = <T extends z.ZodTypeAny>(cell: T): z.ZodRecord<z.ZodString, T> =>
  z.record(z.string(), cell);

const PredictionFlagSchema = z
  .union([z.literal(0), z.literal(1), z.boolean()])
  .transform((value) => value === 1 || value === true);

export const LogColumnsSchema = z.object({
  _id: column(DocumentIdSchema),
  masked_log: column(z.string().nullable()).default({}),
});

export const LogRowSchema = z.object({
  _id: DocumentIdSchema,
  masked_log: z.string().nullable().optional(),
});

export const LogTableSchema = z.union([LogColumnsSchema, z.array(LogRowSchema)]);

export const PredictionColumnsSchema = z.object({
  _id: column(DocumentIdSchema),
  drain_prediction: column(PredictionFlagSchema),
  drain_matched_template_id: column(z.number().int()),
  drain_matched_template_support: column(z.number().nonnegative()),
});

export const PredictionRowSchema = z.object({
  _id: DocumentIdSchema,
  drain_prediction: PredictionFlagSchema,
  drain_matched_template_id: z.number().int(),
  drain_matched_template_support: z.number().nonnegative(),
});

export const PredictionTableSchema = z.union([
  PredictionColumnsSchema,
  z.array(PredictionRowSchema),
]);

export type LogTable = z.infer<typeof LogTableSchema>;
export type PredictionTable = z.infer<typeof PredictionTableSchema>;
