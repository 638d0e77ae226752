import assert from 'node:assert/strict';
import { readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';

import { StoreUnavailableError } from '@airq/core';

import { AirQualityStore, RunLogger, type RunLogEntry } from '../src';
import { createTempDir, logger, openSeededStore } from './helpers';

const entry = (runId: string, overrides: Partial<RunLogEntry> = {}): RunLogEntry => ({
  runId,
  executedAt: new Date('2024-03-02T06:00:00Z'),
  source: 'mediciones',
  inserted: 4,
  updated: 0,
  omitted: 0,
  durationSeconds: 0.5,
  status: 'success',
  message: '3 raw rows read; 3 normalized; 4 inserted; 0 updated; 1 value imputed',
  windowStart: new Date('2024-03-01T00:00:00Z'),
  windowEnd: null,
  ...overrides
});

class RefusingStore extends AirQualityStore {
  constructor(
    databasePath: string,
    private readonly refused: string
  ) {
    super({ databasePath, logger });
  }

  async appendRunLog(log: RunLogEntry): Promise<boolean> {
    if (log.runId === this.refused) {
      throw new StoreUnavailableError('disk detached');
    }
    return super.appendRunLog(log);
  }
}

const exists = async (file: string): Promise<boolean> =>
  stat(file).then(
    () => true,
    () => false
  );

test('stores each run once', async (t) => {
  const dir = await createTempDir(t);
  const store = await openSeededStore(t, dir);
  const runLogger = new RunLogger({ store, journalPath: path.join(dir, 'pending.jsonl'), logger });

  assert.equal(await runLogger.record(entry('run-1')), 'stored');
  assert.equal(await runLogger.record(entry('run-1')), 'duplicate');
  assert.equal((await store.listRunLogs()).length, 1);
});

test('journals entries the store rejects and replays them later', async (t) => {
  const dir = await createTempDir(t);
  const journalPath = path.join(dir, 'journal', 'pending.jsonl');
  const store = new AirQualityStore({ databasePath: path.join(dir, 'airq.db'), logger });
  const runLogger = new RunLogger({ store, journalPath, logger });

  assert.equal(await runLogger.record(entry('run-offline')), 'journaled');
  assert.equal(runLogger.getJournalPath(), journalPath);
  const lines = (await readFile(journalPath, 'utf8')).trim().split('\n');
  assert.equal(lines.length, 1);
  assert.deepEqual(JSON.parse(lines[0]), {
    runId: 'run-offline',
    executedAt: '2024-03-02T06:00:00.000Z',
    source: 'mediciones',
    inserted: 4,
    updated: 0,
    omitted: 0,
    durationSeconds: 0.5,
    status: 'success',
    message: '3 raw rows read; 3 normalized; 4 inserted; 0 updated; 1 value imputed',
    windowStart: '2024-03-01T00:00:00.000Z',
    windowEnd: null
  });

  await store.open();
  t.after(() => store.close());
  assert.equal(await runLogger.replayPending(), 1);
  assert.equal(await exists(journalPath), false);

  const [stored] = await store.listRunLogs();
  assert.equal(stored.runId, 'run-offline');
  assert.equal(stored.executedAt.toISOString(), '2024-03-02T06:00:00.000Z');
  assert.equal(stored.windowStart?.toISOString(), '2024-03-01T00:00:00.000Z');
  assert.equal(stored.windowEnd, null);
});

test('replaying without a journal does nothing', async (t) => {
  const dir = await createTempDir(t);
  const store = await openSeededStore(t, dir);
  const runLogger = new RunLogger({ store, journalPath: path.join(dir, 'pending.jsonl'), logger });

  assert.equal(await runLogger.replayPending(), 0);
});

test('keeps entries from the first failed replay onwards', async (t) => {
  const dir = await createTempDir(t);
  const journalPath = path.join(dir, 'pending.jsonl');
  const store = new RefusingStore(path.join(dir, 'airq.db'), 'run-b');
  await store.open();
  t.after(() => store.close());

  const serialized = ['run-a', 'run-b', 'run-c'].map((runId) =>
    JSON.stringify({ ...entry(runId), executedAt: '2024-03-02T06:00:00.000Z', windowStart: null })
  );
  await writeFile(journalPath, [serialized[0], '{not json', serialized[1], serialized[2]].join('\n') + '\n');

  const runLogger = new RunLogger({ store, journalPath, logger });
  assert.equal(await runLogger.replayPending(), 1);

  assert.deepEqual(
    (await store.listRunLogs()).map((log) => log.runId),
    ['run-a']
  );
  assert.equal(await readFile(journalPath, 'utf8'), `${serialized[1]}\n${serialized[2]}\n`);
});

test('reports a lost entry when neither the store nor the journal accept it', async (t) => {
  const dir = await createTempDir(t);
  const blocker = path.join(dir, 'not-a-directory');
  await writeFile(blocker, '');
  const store = new AirQualityStore({ databasePath: path.join(dir, 'airq.db'), logger });
  const runLogger = new RunLogger({ store, journalPath: path.join(blocker, 'pending.jsonl'), logger });

  assert.equal(await runLogger.record(entry('run-lost')), 'lost');
});
