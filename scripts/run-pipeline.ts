import { readFile } from 'node:fs/promises';
import type { ClassificationResult } from '@logloom/shared/src/types/pipeline.types.js';
import { createTemplateMiner } from '@logloom/core/src/clustering/template-miner.js';
import { compileKeywordPattern, scoreClassifications } from '@logloom/core/src/scoring/anomaly-scorer.js';
import { advanceController, createControllerState } from '@logloom/core/src/retrain/retrain-controller.js';

/** One controller tick per batch, spaced as the live loop would sample. */
const TICK_NS = 20_000_000_000n;

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run replay -- <masked-log-file> [batch-size]');
    process.exit(1);
  }
  const batchSize = Number(process.argv[3] ?? '100');
  const keywords = (process.env['FAIL_KEYWORDS'] ?? '')
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k.length > 0);

  console.log('=== logloom replay ===\n');
  console.log(`Input: ${file}`);
  console.log(`Batch size: ${String(batchSize)}`);
  console.log(`Keywords: ${keywords.length > 0 ? keywords.join(', ') : '(none)'}\n`);

  const lines = (await readFile(file, 'utf8')).split('\n').filter((line) => line.trim().length > 0);
  const miner = createTemplateMiner();
  const pattern = compileKeywordPattern(keywords);
  let controller = createControllerState(0n);
  let anomalies = 0;
  let signals = 0;

  for (let start = 0, tick = 1; start < lines.length; start += batchSize, tick++) {
    const results: ClassificationResult[] = lines
      .slice(start, start + batchSize)
      .map((text, i) => ({ id: String(start + i), ...miner.classify(text) }));
    anomalies += scoreClassifications(results, pattern).filter((r) => r.isAnomalous).length;

    const step = advanceController(controller, miner.snapshotClusterCount(), BigInt(tick) * TICK_NS);
    controller = step.state;
    if (step.kind === 'sampled' && step.event) {
      signals += 1;
      console.log(
        `Retrain signal at batch ${String(tick)}: ${String(step.event.clusterCount)} clusters, ` +
          `${String(step.event.timeIntervals.length)} stable periods`,
      );
    }
  }

  const templates = miner.templates().sort((a, b) => b.support - a.support);
  console.log('\n--- Summary ---');
  console.log(`  Lines: ${String(lines.length)}`);
  console.log(`  Clusters: ${String(templates.length)}`);
  console.log(`  Anomalous lines: ${String(anomalies)}`);
  console.log(`  Retrain signals: ${String(signals)}`);

  console.log('\n--- Top templates ---');
  for (const t of templates.slice(0, 10)) {
    console.log(`  [${String(t.clusterId)}] x${String(t.support)}  ${t.template}`);
  }
}

main().catch((error: unknown) => {
  console.error('Replay failed:', error);
  process.exit(1);
});
