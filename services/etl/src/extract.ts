import { readFile, stat } from 'node:fs/promises';

import { z } from 'zod';

import {
  ConfigurationError,
  RunCancelledError,
  SchemaMismatchError,
  TimeoutError,
  rawBatchSchema,
  type RawRow
} from '@airq/core';

export interface ReadBatchOptions {
  /** Profile id used when the file does not name its source. */
  source?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RawBatchInput {
  source: string;
  extractedAt: Date;
  rows: RawRow[];
}

const rowSchema = z.record(z.string(), z.unknown());
const documentSchema = z.union([rawBatchSchema, z.array(rowSchema)]);

type BatchDocument = z.infer<typeof rawBatchSchema>;

const parseNdjson = (text: string, filePath: string): Array<Record<string, unknown>> =>
  text
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new SchemaMismatchError(`Line ${lineNumber} of ${filePath} is not valid JSON`, 'rows');
      }
      const row = rowSchema.safeParse(parsed);
      if (!row.success) {
        throw new SchemaMismatchError(`Line ${lineNumber} of ${filePath} is not a JSON object`, 'rows');
      }
      return row.data;
    });

const parseDocument = (text: string, filePath: string): BatchDocument | Array<Record<string, unknown>> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return parseNdjson(text, filePath);
  }
  const document = documentSchema.safeParse(parsed);
  if (!document.success) {
    // A single-line NDJSON file parses as one object without a rows array.
    const single = rowSchema.safeParse(parsed);
    if (single.success && !('rows' in single.data)) {
      return [single.data];
    }
    throw new SchemaMismatchError(`${filePath} is neither a raw batch, a JSON array nor NDJSON`, 'rows');
  }
  return document.data;
};

const readWithTimeout = async (filePath: string, options: ReadBatchOptions): Promise<string> => {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
  try {
    return await readFile(filePath, { encoding: 'utf8', signal });
  } catch (error) {
    if (timeout.aborted) {
      throw new TimeoutError('extraction', options.timeoutMs);
    }
    if (options.signal?.aborted) {
      throw new RunCancelledError('extraction');
    }
    throw error;
  }
};

/**
 * Reads an already-fetched batch of raw rows: a `{ source, extractedAt?, rows }`
 * envelope, a bare JSON array of rows, or NDJSON with one row per line.
 */
export async function readRawBatch(filePath: string, options: ReadBatchOptions): Promise<RawBatchInput> {
  const text = await readWithTimeout(filePath, options);
  const document = parseDocument(text, filePath);

  const envelope = Array.isArray(document) ? null : document;
  const source = envelope?.source ?? options.source;
  if (!source) {
    throw new ConfigurationError(`${filePath} does not name its source; pass --source`);
  }

  const extractedAt = envelope?.extractedAt ? new Date(envelope.extractedAt) : (await stat(filePath)).mtime;
  const fields = Array.isArray(document) ? document : document.rows;
  return {
    source,
    extractedAt,
    rows: fields.map((row) => ({ source, extractedAt, fields: row }))
  };
}
