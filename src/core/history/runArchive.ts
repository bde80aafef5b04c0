import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CompositeResult } from '../agentRuntime/agent-types';
import { logger } from '../../shared/logging/logger';

export interface ArchivedRun {
  traceId: string;
  recordedAt: string;
  result: CompositeResult;
}

export interface RunArchive {
  append(run: ArchivedRun): Promise<void>;
  list(): Promise<ArchivedRun[]>;
}

function isArchivedRun(value: unknown): value is ArchivedRun {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'traceId' in value &&
    'recordedAt' in value &&
    'result' in value &&
    typeof value.traceId === 'string' &&
    typeof value.result === 'object' &&
    value.result !== null
  );
}

/** Append-only JSON Lines archive of completed prioritization runs. */
export class JsonlRunArchive implements RunArchive {
  constructor(private readonly filePath: string) {}

  async append(run: ArchivedRun): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(run)}\n`, 'utf8');
  }

  async list(): Promise<ArchivedRun[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const runs: ArchivedRun[] = [];
    text.split('\n').forEach((line, lineNo) => {
      if (!line.trim()) return;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isArchivedRun(parsed)) runs.push(parsed);
      } catch (error) {
        logger.warn({ err: error, path: this.filePath, line: lineNo + 1 }, '[RunArchive] Skipping malformed line');
      }
    });
    return runs;
  }
}

export class InMemoryRunArchive implements RunArchive {
  readonly runs: ArchivedRun[] = [];

  async append(run: ArchivedRun): Promise<void> {
    this.runs.push(run);
  }

  async list(): Promise<ArchivedRun[]> {
    return [...this.runs];
  }
}
