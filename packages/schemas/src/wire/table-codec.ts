import type { ZodError } from 'zod';
import { PayloadDecodeError } from '@logloom/shared/src/utils/errors.js';
import type { LogRecord, ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import { formatZodErrors } from '../validators.js';
import { LogTableSchema, PredictionTableSchema } from './table.schema.js';

export type Payload = string | Uint8Array;

const decoder = new TextDecoder();

function parseJson(payload: Payload, kind: string): unknown {
  const text = typeof payload === 'string' ? payload : decoder.decode(payload);
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new PayloadDecodeError(
      `Invalid JSON in ${kind} payload`,
      [],
      error instanceof Error ? error : undefined,
    );
  }
}

function malformed(kind: string, error: ZodError): PayloadDecodeError {
  return new PayloadDecodeError(`Malformed ${kind} payload`, formatZodErrors(error));
}

function compareRowKeys(a: string, b: string): number {
  const diff = Number(a) - Number(b);
  return Number.isNaN(diff) ? a.localeCompare(b) : diff;
}

function rowKeys(column: Record<string, unknown>): string[] {
  return Object.keys(column).sort(compareRowKeys);
}

function requireCell<T>(column: Record<string, T>, key: string, name: string): T {
  const value = column[key];
  if (value === undefined) {
    throw new PayloadDecodeError(`Missing ${name} for row ${key}`, [`${name}.${key}: Required`]);
  }
  return value;
}

export function decodeLogBatch(payload: Payload): LogRecord[] {
  const result = LogTableSchema.safeParse(parseJson(payload, 'log batch'));
  if (!result.success) {
    throw malformed('log batch', result.error);
  }
  const table = result.data;

  if (Array.isArray(table)) {
    return table.map((row) => ({ id: row._id, maskedText: row.masked_log ?? null }));
  }

  return rowKeys(table._id).map((key) => ({
    id: table._id[key],
    maskedText: table.masked_log[key] ?? null,
  }));
}

export function decodePredictionBatch(payload: Payload): ScoredRecord[] {
  const result = PredictionTableSchema.safeParse(parseJson(payload, 'prediction batch'));
  if (!result.success) {
    throw malformed('prediction batch', result.error);
  }
  const table = result.data;

  if (Array.isArray(table)) {
    return table.map((row) => ({
      id: row._id,
      isAnomalous: row.drain_prediction,
      clusterId: row.drain_matched_template_id,
      clusterSupport: row.drain_matched_template_support,
    }));
  }

  return rowKeys(table._id).map((key) => ({
    id: table._id[key],
    isAnomalous: requireCell(table.drain_prediction, key, 'drain_prediction'),
    clusterId: requireCell(table.drain_matched_template_id, key, 'drain_matched_template_id'),
    clusterSupport: requireCell(
      table.drain_matched_template_support,
      key,
      'drain_matched_template_support',
    ),
  }));
}

export function encodePredictionBatch(records: readonly ScoredRecord[]): string {
  const ids: Record<string, string> = {};
  const predictions: Record<string, number> = {};
  const clusterIds: Record<string, number> = {};
  const supports: Record<string, number> = {};

  records.forEach((record, i) => {
    const key = String(i);
    ids[key] = record.id;
    predictions[key] = record.isAnomalous ? 1 : 0;
    clusterIds[key] = record.clusterId;
    supports[key] = record.clusterSupport;
  });

  return JSON.stringify({
    _id: ids,
    drain_prediction: predictions,
    drain_matched_template_id: clusterIds,
    drain_matched_template_support: supports,
  });
}
