import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from '../../shared/logging/logger';

const labRecordSchema = z.object({
  compound: z.string().trim().min(1),
  /** Fraction of the fibrotic phenotype reversed, 0..1. */
  efficacy: z.number().min(0).max(1),
  /** Percent viable cells remaining at screening concentration, 0..100. */
  percentRemainingCells: z.number().min(0).max(100).optional(),
  assay: z.string().optional(),
  notes: z.string().optional(),
});

const labHistorySchema = z.object({
  assay: z.string().default('cardiac fibroblast screen'),
  records: z.array(labRecordSchema),
});

export type LabRecord = z.infer<typeof labRecordSchema>;

export interface LabHistorySource {
  listRecords(): Promise<LabRecord[]>;
}

/** Read-only store of historical assay outcomes, loaded once from a JSON file. */
export class JsonLabHistoryStore implements LabHistorySource {
  private loading?: Promise<LabRecord[]>;

  constructor(private readonly filePath: string) {}

  listRecords(): Promise<LabRecord[]> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<LabRecord[]> {
    const text = await readFile(this.filePath, 'utf8');
    const parsed = labHistorySchema.parse(JSON.parse(text));
    logger.debug({ path: this.filePath, records: parsed.records.length }, '[LabHistory] Loaded');
    return parsed.records;
  }
}

export class InMemoryLabHistoryStore implements LabHistorySource {
  constructor(private readonly records: LabRecord[]) {}

  async listRecords(): Promise<LabRecord[]> {
    return this.records;
  }
}

export function sameCompound(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
