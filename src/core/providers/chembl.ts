/**
 * ChEMBL REST capabilities: compound search, bioactivities, mechanisms,
 * molecule properties, indications and drug warnings.
 */
import { z } from 'zod';
import type { ToolRegistry } from '../gateway/toolRegistry';
import { buildUrl, fetchJson } from './httpClient';

export interface ChemblProviderOptions {
  baseUrl: string;
}

const chemblId = z
  .string()
  .trim()
  .regex(/^CHEMBL\d+$/i, 'expected a ChEMBL ID such as CHEMBL25')
  .transform((value) => value.toUpperCase());

const moleculeSchema = z.object({
  molecule_chembl_id: z.string(),
  pref_name: z.string().nullable().optional(),
  max_phase: z.union([z.number(), z.string()]).nullable().optional(),
  molecule_type: z.string().nullable().optional(),
  molecule_synonyms: z.array(z.object({ molecule_synonym: z.string() })).optional(),
  molecule_properties: z
    .object({
      full_mwt: z.string().nullable().optional(),
      alogp: z.string().nullable().optional(),
      psa: z.string().nullable().optional(),
      hba: z.number().nullable().optional(),
      hbd: z.number().nullable().optional(),
      num_ro5_violations: z.number().nullable().optional(),
      full_molformula: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

const moleculeSearchSchema = z.object({ molecules: z.array(moleculeSchema).default([]) });

const activitySchema = z.object({
  activities: z
    .array(
      z.object({
        activity_id: z.number(),
        assay_chembl_id: z.string().nullable().optional(),
        assay_description: z.string().nullable().optional(),
        standard_type: z.string().nullable().optional(),
        standard_relation: z.string().nullable().optional(),
        standard_value: z.string().nullable().optional(),
        standard_units: z.string().nullable().optional(),
        target_pref_name: z.string().nullable().optional(),
        target_organism: z.string().nullable().optional(),
      }),
    )
    .default([]),
});

const mechanismSchema = z.object({
  mechanisms: z
    .array(
      z.object({
        mechanism_of_action: z.string().nullable().optional(),
        action_type: z.string().nullable().optional(),
        target_chembl_id: z.string().nullable().optional(),
        direct_interaction: z.boolean().nullable().optional(),
      }),
    )
    .default([]),
});

const indicationSchema = z.object({
  drug_indications: z
    .array(
      z.object({
        efo_term: z.string().nullable().optional(),
        mesh_heading: z.string().nullable().optional(),
        max_phase_for_ind: z.union([z.number(), z.string()]).nullable().optional(),
      }),
    )
    .default([]),
});

const warningSchema = z.object({
  drug_warnings: z
    .array(
      z.object({
        warning_type: z.string().nullable().optional(),
        warning_class: z.string().nullable().optional(),
        warning_description: z.string().nullable().optional(),
        warning_country: z.string().nullable().optional(),
        warning_year: z.number().nullable().optional(),
      }),
    )
    .default([]),
});

export type ChemblMolecule = z.infer<typeof moleculeSchema>;

function summarizeMolecule(molecule: ChemblMolecule) {
  return {
    chemblId: molecule.molecule_chembl_id,
    name: molecule.pref_name ?? null,
    maxPhase: molecule.max_phase ?? null,
    type: molecule.molecule_type ?? null,
    synonyms: Array.from(new Set((molecule.molecule_synonyms ?? []).map((s) => s.molecule_synonym))).slice(0, 10),
  };
}

export function registerChemblTools(registry: ToolRegistry, options: ChemblProviderOptions): void {
  const url = (path: string, query?: Record<string, string | number | undefined>) =>
    buildUrl(options.baseUrl, path, query);

  registry.register({
    name: 'search_compounds',
    description: 'Search ChEMBL for compounds by name, synonym or identifier. Returns ChEMBL IDs, names, clinical phase and synonyms.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({
      query: z.string().trim().min(1).max(200),
      limit: z.number().int().min(1).max(25).default(5),
    }),
    async execute({ query, limit }, ctx) {
      const raw = await fetchJson(url('/molecule/search.json', { q: query, limit }), { signal: ctx.signal });
      const { molecules } = moleculeSearchSchema.parse(raw);
      return { query, molecules: molecules.map(summarizeMolecule) };
    },
  });

  registry.register({
    name: 'get_compound_bioactivities',
    description:
      'Reported bioactivities (IC50, Ki, EC50, ...) of a ChEMBL compound with assay and target. Optionally filter by activity type and an upper activity value.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({
      chembl_id: chemblId,
      max_results: z.number().int().min(1).max(50).default(10),
      activity_type: z.string().trim().min(1).max(40).optional(),
      max_activity_value: z.number().positive().optional(),
    }),
    async execute(args, ctx) {
      const raw = await fetchJson(
        url('/activity.json', {
          molecule_chembl_id: args.chembl_id,
          limit: args.max_results,
          standard_type: args.activity_type,
          standard_value__lt: args.max_activity_value,
        }),
        { signal: ctx.signal },
      );
      const { activities } = activitySchema.parse(raw);
      return {
        chemblId: args.chembl_id,
        activities: activities.map((a) => ({
          activityId: a.activity_id,
          assay: a.assay_chembl_id ?? null,
          assayDescription: a.assay_description ?? null,
          type: a.standard_type ?? null,
          relation: a.standard_relation ?? null,
          value: a.standard_value ?? null,
          units: a.standard_units ?? null,
          target: a.target_pref_name ?? null,
          organism: a.target_organism ?? null,
        })),
      };
    },
  });

  registry.register({
    name: 'get_mechanisms_of_action',
    description: 'Known mechanisms of action and targets for a ChEMBL compound.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({ chembl_id: chemblId }),
    async execute({ chembl_id }, ctx) {
      const raw = await fetchJson(url('/mechanism.json', { molecule_chembl_id: chembl_id }), { signal: ctx.signal });
      const { mechanisms } = mechanismSchema.parse(raw);
      return {
        chemblId: chembl_id,
        mechanisms: mechanisms.map((m) => ({
          mechanism: m.mechanism_of_action ?? null,
          actionType: m.action_type ?? null,
          target: m.target_chembl_id ?? null,
          direct: m.direct_interaction ?? null,
        })),
      };
    },
  });

  registry.register({
    name: 'get_molecule_info',
    description: 'Molecule record for a ChEMBL ID: name, phase, formula and drug-likeness properties.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({ chembl_id: chemblId }),
    async execute({ chembl_id }, ctx) {
      const raw = await fetchJson(url(`/molecule/${encodeURIComponent(chembl_id)}.json`), { signal: ctx.signal });
      const molecule = moleculeSchema.parse(raw);
      const props = molecule.molecule_properties;
      return {
        ...summarizeMolecule(molecule),
        properties: props
          ? {
              formula: props.full_molformula ?? null,
              molecularWeight: props.full_mwt ?? null,
              alogp: props.alogp ?? null,
              psa: props.psa ?? null,
              hbondAcceptors: props.hba ?? null,
              hbondDonors: props.hbd ?? null,
              ro5Violations: props.num_ro5_violations ?? null,
            }
          : null,
      };
    },
  });

  registry.register({
    name: 'get_drug_indications',
    description: 'Indications (diseases) a ChEMBL compound has been investigated or approved for, with the maximum phase reached.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({
      chembl_id: chemblId,
      limit: z.number().int().min(1).max(50).default(20),
    }),
    async execute({ chembl_id, limit }, ctx) {
      const raw = await fetchJson(url('/drug_indication.json', { molecule_chembl_id: chembl_id, limit }), {
        signal: ctx.signal,
      });
      const { drug_indications } = indicationSchema.parse(raw);
      return {
        chemblId: chembl_id,
        indications: drug_indications.map((i) => ({
          term: i.efo_term ?? i.mesh_heading ?? null,
          maxPhase: i.max_phase_for_ind ?? null,
        })),
      };
    },
  });

  registry.register({
    name: 'get_drug_warnings',
    description: 'Regulatory safety warnings (black box, withdrawal) recorded for a ChEMBL compound.',
    provider: 'chembl',
    sideEffect: 'read_only',
    schema: z.object({ chembl_id: chemblId }),
    async execute({ chembl_id }, ctx) {
      const raw = await fetchJson(url('/drug_warning.json', { molecule_chembl_id: chembl_id }), { signal: ctx.signal });
      const { drug_warnings } = warningSchema.parse(raw);
      return {
        chemblId: chembl_id,
        warnings: drug_warnings.map((w) => ({
          type: w.warning_type ?? null,
          class: w.warning_class ?? null,
          description: w.warning_description ?? null,
          country: w.warning_country ?? null,
          year: w.warning_year ?? null,
        })),
      };
    },
  });
}
