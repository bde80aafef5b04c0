import { z } from 'zod';
import type { ToolRegistry } from '../gateway/toolRegistry';
import { sameCompound, type LabHistorySource, type LabRecord } from '../history/labHistoryStore';
import type { ArchivedRun, RunArchive } from '../history/runArchive';

export interface LabHistoryProviderOptions {
  store: LabHistorySource;
  archive?: RunArchive;
}

function queryTerms(query: string): string[] {
  const terms = query.toLowerCase().match(/[a-z0-9][a-z0-9-]{2,}/g) ?? [];
  return [...new Set(terms)];
}

function runText(run: ArchivedRun): string {
  const { result } = run;
  return [
    result.compound.name,
    result.reasoning,
    result.leaves.efficacy.reasoning,
    result.leaves.toxicity.reasoning,
  ]
    .join('\n')
    .toLowerCase();
}

export function registerLabHistoryTools(registry: ToolRegistry, options: LabHistoryProviderOptions): void {
  const { store, archive } = options;

  registry.register({
    name: 'get_lab_compounds',
    description:
      'Measured results of compounds from past fibroblast screening runs: efficacy (0-1) and percent of cells remaining after 10 uM. ' +
      'Sorted highest first by sort_by. Pass the compound under evaluation as exclude_compound.',
    provider: 'lab',
    sideEffect: 'read_only',
    schema: z.object({
      exclude_compound: z.string().trim().min(1).max(200),
      sort_by: z.enum(['efficacy', 'percent_remaining_cells']).default('efficacy'),
      limit: z.number().int().min(1).max(200).default(50),
    }),
    async execute({ exclude_compound, sort_by, limit }) {
      const records = (await store.listRecords()).filter((record) => !sameCompound(record.compound, exclude_compound));
      // Records without a viability reading carry nothing to rank on.
      const ranked: LabRecord[] =
        sort_by === 'efficacy'
          ? records.sort((a, b) => b.efficacy - a.efficacy)
          : records
              .flatMap((record) =>
                record.percentRemainingCells === undefined ? [] : [{ ...record, viability: record.percentRemainingCells }],
              )
              .sort((a, b) => b.viability - a.viability);
      const compounds = ranked.slice(0, limit).map((record) => ({
        compound: record.compound,
        efficacy: record.efficacy,
        percentRemainingCells: record.percentRemainingCells ?? null,
      }));
      return { excluded: exclude_compound, sortedBy: sort_by, compounds };
    },
  });

  if (!archive) return;

  registry.register({
    name: 'get_past_runs',
    description:
      'Earlier prioritization runs for another compound: predicted scores, confidence and reasoning. Not for the compound under evaluation.',
    provider: 'lab',
    sideEffect: 'read_only',
    // The archive grows while the process runs.
    cacheable: false,
    schema: z.object({
      compound: z.string().trim().min(1).max(200),
      n_runs: z.number().int().min(1).max(5).default(1),
    }),
    async execute({ compound, n_runs }) {
      const runs = (await archive.list())
        .filter((run) => sameCompound(run.result.compound.name, compound) || sameCompound(run.result.compound.query, compound))
        .slice(-n_runs)
        .map((run) => ({
          recordedAt: run.recordedAt,
          priorityScore: run.result.priorityScore,
          confidence: run.result.confidence,
          reasoning: run.result.reasoning,
          efficacy: {
            score: run.result.leaves.efficacy.predictedScore,
            confidence: run.result.leaves.efficacy.confidence,
            reasoning: run.result.leaves.efficacy.reasoning,
          },
          toxicity: {
            score: run.result.leaves.toxicity.predictedScore,
            confidence: run.result.leaves.toxicity.confidence,
            reasoning: run.result.leaves.toxicity.reasoning,
          },
        }));
      return { compound, runs };
    },
  });
  registry.register({
    name: 'search_past_runs',
    description:
      'Search earlier prioritization runs of other compounds by free text (mechanism, target, pathway). ' +
      'Returns the best-matching runs with their scores and reasoning. Pass the compound under evaluation as exclude_compound.',
    provider: 'lab',
    sideEffect: 'read_only',
    cacheable: false,
    schema: z.object({
      query: z.string().trim().min(1).max(500),
      exclude_compound: z.string().trim().min(1).max(200),
      limit: z.number().int().min(1).max(5).default(3),
    }),
    async execute({ query, exclude_compound, limit }) {
      const terms = queryTerms(query);
      const runs = (await archive.list())
        .filter(
          (run) =>
            !sameCompound(run.result.compound.name, exclude_compound) &&
            !sameCompound(run.result.compound.query, exclude_compound),
        )
        .map((run, order) => {
          const text = runText(run);
          return { run, order, matchedTerms: terms.filter((term) => text.includes(term)) };
        })
        .filter((hit) => hit.matchedTerms.length > 0)
        // Most matched terms first; newer runs break ties.
        .sort((a, b) => b.matchedTerms.length - a.matchedTerms.length || b.order - a.order)
        .slice(0, limit)
        .map(({ run, matchedTerms }) => ({
          compound: run.result.compound.name,
          recordedAt: run.recordedAt,
          matchedTerms,
          priorityScore: run.result.priorityScore,
          efficacyScore: run.result.leaves.efficacy.predictedScore,
          toxicityScore: run.result.leaves.toxicity.predictedScore,
          reasoning: run.result.reasoning,
        }));
      return { query, excluded: exclude_compound, runs };
    },
  });
}
