import { z } from 'zod';
import type { ToolRegistry } from '../gateway/toolRegistry';
import { buildUrl, fetchJson, fetchJsonOrNull } from './httpClient';

export interface PubChemProviderOptions {
  /** PUG REST root, e.g. https://pubchem.ncbi.nlm.nih.gov/rest/pug */
  baseUrl: string;
}

const PROPERTY_NAMES = [
  'MolecularFormula',
  'MolecularWeight',
  'IUPACName',
  'XLogP',
  'TPSA',
  'HBondDonorCount',
  'HBondAcceptorCount',
  'RotatableBondCount',
  'Complexity',
  'Charge',
] as const;

const cid = z.coerce.number().int().positive();

const cidListSchema = z.object({
  IdentifierList: z.object({ CID: z.array(z.number()).default([]) }).optional(),
});

const propertyTableSchema = z.object({
  PropertyTable: z.object({
    Properties: z.array(
      z.object({
        CID: z.number(),
        MolecularFormula: z.string().optional(),
        MolecularWeight: z.union([z.string(), z.number()]).optional(),
        IUPACName: z.string().optional(),
        XLogP: z.number().optional(),
        TPSA: z.number().optional(),
        HBondDonorCount: z.number().optional(),
        HBondAcceptorCount: z.number().optional(),
        RotatableBondCount: z.number().optional(),
        Complexity: z.number().optional(),
        Charge: z.number().optional(),
      }),
    ),
  }),
});

const analogTableSchema = z.object({
  PropertyTable: z.object({
    Properties: z.array(
      z.object({
        CID: z.number(),
        Title: z.string().optional(),
        IUPACName: z.string().optional(),
        MolecularFormula: z.string().optional(),
      }),
    ),
  }),
});

const assaySummarySchema = z.object({
  Table: z.object({
    Columns: z.object({ Column: z.array(z.string()) }),
    Row: z.array(z.object({ Cell: z.array(z.union([z.string(), z.number()])) })).default([]),
  }),
});

interface PugViewSection {
  TOCHeading?: string;
  Section?: PugViewSection[];
  Information?: Array<{
    Name?: string;
    Value?: { StringWithMarkup?: Array<{ String?: string }> };
  }>;
}

const pugViewSectionSchema: z.ZodType<PugViewSection> = z.lazy(() =>
  z.object({
    TOCHeading: z.string().optional(),
    Section: z.array(pugViewSectionSchema).optional(),
    Information: z
      .array(
        z.object({
          Name: z.string().optional(),
          Value: z
            .object({ StringWithMarkup: z.array(z.object({ String: z.string().optional() })).optional() })
            .optional(),
        }),
      )
      .optional(),
  }),
);

const pugViewSchema = z.object({
  Record: z.object({ Section: z.array(pugViewSectionSchema).default([]) }),
});

/** Flatten a PUG View record into `heading -> strings`, keyed by the innermost TOC heading. */
export function collectPugViewStrings(sections: PugViewSection[], maxPerHeading = 5): Record<string, string[]> {
  const collected: Record<string, string[]> = {};
  const visit = (section: PugViewSection, heading: string) => {
    const current = section.TOCHeading ?? heading;
    for (const info of section.Information ?? []) {
      for (const markup of info.Value?.StringWithMarkup ?? []) {
        const text = markup.String?.trim();
        if (!text) continue;
        const bucket = (collected[current] ??= []);
        if (bucket.length < maxPerHeading && !bucket.includes(text)) bucket.push(text);
      }
    }
    for (const child of section.Section ?? []) visit(child, current);
  };
  for (const section of sections) visit(section, section.TOCHeading ?? 'Record');
  return collected;
}

function pugViewRoot(pugRestBase: string): string {
  return pugRestBase.replace(/\/pug\/?$/, '/pug_view');
}

export function registerPubChemTools(registry: ToolRegistry, options: PubChemProviderOptions): void {
  const viewRoot = pugViewRoot(options.baseUrl);

  const fetchPugView = async (compoundId: number, heading: string, signal?: AbortSignal) => {
    const raw = await fetchJsonOrNull(buildUrl(viewRoot, `/data/compound/${compoundId}/JSON`, { heading }), { signal });
    if (raw === null) return {};
    return collectPugViewStrings(pugViewSchema.parse(raw).Record.Section);
  };

  registry.register({
    name: 'search_pubchem_cid',
    description: 'Look up PubChem compound IDs (CIDs) by compound name, CAS number or formula.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({
      query: z.string().trim().min(1).max(200),
      limit: z.number().int().min(1).max(10).default(5),
    }),
    async execute({ query, limit }, ctx) {
      const raw = await fetchJsonOrNull(
        buildUrl(options.baseUrl, `/compound/name/${encodeURIComponent(query)}/cids/JSON`, { MaxRecords: limit }),
        { signal: ctx.signal },
      );
      const cids = raw === null ? [] : (cidListSchema.parse(raw).IdentifierList?.CID ?? []);
      return { query, cids: cids.slice(0, limit) };
    },
  });

  registry.register({
    name: 'get_cid_properties',
    description: 'Physicochemical properties of a PubChem compound relevant to drug-likeness (MW, XLogP, TPSA, H-bonding, flexibility, charge).',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({ cid }),
    async execute(args, ctx) {
      const raw = await fetchJson(
        buildUrl(options.baseUrl, `/compound/cid/${args.cid}/property/${PROPERTY_NAMES.join(',')}/JSON`),
        { signal: ctx.signal },
      );
      const [props] = propertyTableSchema.parse(raw).PropertyTable.Properties;
      if (!props) return { cid: args.cid, properties: null };
      const { CID: _cid, ...properties } = props;
      return { cid: args.cid, properties };
    },
  });

  registry.register({
    name: 'find_similar_compounds',
    description:
      'Structural analogs of a PubChem compound by 2D Tanimoto similarity (threshold 80-100%), with names and formulas. Useful for scaffold hopping.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({
      cid,
      threshold: z.number().int().min(80).max(100).default(90),
      max_results: z.number().int().min(1).max(10).default(5),
    }),
    async execute(args, ctx) {
      const raw = await fetchJsonOrNull(
        buildUrl(options.baseUrl, `/compound/fastsimilarity_2d/cid/${args.cid}/cids/JSON`, {
          Threshold: args.threshold,
          // The query compound is usually its own first hit.
          MaxRecords: args.max_results + 1,
        }),
        { signal: ctx.signal },
      );
      const found = raw === null ? [] : (cidListSchema.parse(raw).IdentifierList?.CID ?? []);
      const analogs = found.filter((id) => id !== args.cid).slice(0, args.max_results);
      if (analogs.length === 0) return { cid: args.cid, threshold: args.threshold, compounds: [] };

      const props = await fetchJson(
        buildUrl(options.baseUrl, `/compound/cid/${analogs.join(',')}/property/Title,IUPACName,MolecularFormula/JSON`),
        { signal: ctx.signal },
      );
      return {
        cid: args.cid,
        threshold: args.threshold,
        compounds: analogTableSchema.parse(props).PropertyTable.Properties.map((row) => ({
          cid: row.CID,
          name: row.Title ?? row.IUPACName ?? null,
          formula: row.MolecularFormula ?? null,
        })),
      };
    },
  });

  registry.register({
    name: 'get_bioassay_summary',
    description: 'Active results from PubChem bioassays for a compound: assay, target and activity value.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({
      cid,
      max_assays: z.number().int().min(1).max(20).default(5),
    }),
    async execute(args, ctx) {
      const raw = await fetchJsonOrNull(buildUrl(options.baseUrl, `/compound/cid/${args.cid}/assaysummary/JSON`), {
        signal: ctx.signal,
      });
      if (raw === null) return { cid: args.cid, totalAssays: 0, activeAssays: 0, assays: [] };

      const table = assaySummarySchema.parse(raw).Table;
      const columns = table.Columns.Column;
      const rows = table.Row.map((row) =>
        Object.fromEntries(columns.map((column, idx) => [column, row.Cell[idx] ?? null])),
      );
      const active = rows.filter((row) => row['Activity Outcome'] === 'Active');
      return {
        cid: args.cid,
        totalAssays: rows.length,
        activeAssays: active.length,
        assays: active.slice(0, args.max_assays).map((row) => ({
          aid: row['AID'] ?? null,
          name: row['Assay Name'] ?? null,
          target: row['Target Name'] ?? null,
          activityName: row['Activity Name'] ?? null,
          activityValue: row['Activity Value [uM]'] ?? null,
        })),
      };
    },
  });

  registry.register({
    name: 'get_safety_summary',
    description: 'GHS hazard classification of a PubChem compound: pictograms, signal word and hazard statements.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({ cid }),
    async execute(args, ctx) {
      return { cid: args.cid, sections: await fetchPugView(args.cid, 'GHS Classification', ctx.signal) };
    },
  });

  registry.register({
    name: 'get_toxicity_summary',
    description: 'Toxicity information for a PubChem compound: toxicity summary, hepatotoxicity, non-human toxicity values.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({ cid }),
    async execute(args, ctx) {
      return { cid: args.cid, sections: await fetchPugView(args.cid, 'Toxicity', ctx.signal) };
    },
  });

  registry.register({
    name: 'get_drug_summary',
    description: 'Drug and medication information for a PubChem compound: therapeutic uses, drug classes, FDA status.',
    provider: 'pubchem',
    sideEffect: 'read_only',
    schema: z.object({ cid }),
    async execute(args, ctx) {
      return { cid: args.cid, sections: await fetchPugView(args.cid, 'Drug and Medication Information', ctx.signal) };
    },
  });
}
