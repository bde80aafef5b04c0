import { appendFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JsonLabHistoryStore } from '../../../src/core/history/labHistoryStore';
import { JsonlRunArchive } from '../../../src/core/history/runArchive';
import { TEST_COMPOUND, leafResult } from '../support/agentFixtures';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, childLogger: () => log };
});

describe('JsonlRunArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'run-archive-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists nothing before the first append', async () => {
    await expect(new JsonlRunArchive(path.join(dir, 'runs.jsonl')).list()).resolves.toEqual([]);
  });

  it('appends runs and skips malformed lines', async () => {
    const file = path.join(dir, 'nested', 'runs.jsonl');
    const archive = new JsonlRunArchive(file);
    const run = {
      traceId: 'run-1',
      recordedAt: '2026-01-01T00:00:00.000Z',
      result: {
        compound: TEST_COMPOUND,
        priorityScore: 0.5,
        confidence: 0.6,
        reasoning: 'first',
        leaves: { efficacy: leafResult({ role: 'efficacy' }), toxicity: leafResult({ role: 'toxicity' }) },
      },
    };

    await archive.append(run);
    await appendFile(file, '{not json\n', 'utf8');
    await archive.append({ ...run, traceId: 'run-2' });

    const runs = await archive.list();
    expect(runs.map((r) => r.traceId)).toEqual(['run-1', 'run-2']);
    expect(runs[0]).toEqual(run);
  });
});

describe('JsonLabHistoryStore', () => {
  it('loads the bundled screening history', async () => {
    const store = new JsonLabHistoryStore(path.join(process.cwd(), 'data', 'lab-history.json'));

    const records = await store.listRecords();

    expect(records.length).toBeGreaterThan(0);
    expect(records[0]).toEqual({
      compound: 'Compound A-101',
      efficacy: 0.82,
      percentRemainingCells: 88,
      notes: 'strong reversal, mild cytostasis',
    });
    expect(await store.listRecords()).toBe(records);
  });
});
