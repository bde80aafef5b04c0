import type { AgentRole, AgentRoleDefinition } from '../agentRuntime/agent-types';
import type { ToolRegistry } from '../gateway/toolRegistry';

const EFFICACY_TOOLS = [
  'search_compounds',
  'get_compound_bioactivities',
  'get_mechanisms_of_action',
  'get_molecule_info',
  'get_drug_indications',
  'search_pubchem_cid',
  'get_cid_properties',
  'find_similar_compounds',
  'get_bioassay_summary',
  'get_drug_summary',
  'search_web',
  'search_pubmed_abstracts',
  'get_lab_compounds',
  'get_past_runs',
  'search_past_runs',
] as const;

const TOXICITY_TOOLS = [
  'search_compounds',
  'get_compound_bioactivities',
  'get_mechanisms_of_action',
  'get_molecule_info',
  'get_drug_warnings',
  'search_pubchem_cid',
  'get_cid_properties',
  'find_similar_compounds',
  'get_bioassay_summary',
  'get_safety_summary',
  'get_toxicity_summary',
  'search_web',
  'search_pubmed_abstracts',
  'get_lab_compounds',
] as const;

export const EFFICACY_ROLE: AgentRoleDefinition = {
  role: 'efficacy',
  scoreDomain: { min: 0, max: 1, unit: 'fraction of the fibrotic phenotype reversed' },
  allowedTools: EFFICACY_TOOLS,
  objective:
    'You predict how strongly a compound reverses the fibrotic phenotype of TGF-beta1 activated primary human ventricular fibroblasts in a 10 uM screening assay.',
  guidance: [
    'Look for anti-fibrotic mechanisms: TGF-beta/SMAD, HDAC, BET, kinase or myofibroblast-transition inhibition.',
    'Compare with measured efficacy of past screening compounds when a similar mechanism exists.',
    'A compound that kills the cells does not reverse the phenotype; factor obvious cytotoxicity into efficacy.',
    'Lower your confidence when evidence is indirect or comes from unrelated tissues.',
  ],
};

export const TOXICITY_ROLE: AgentRoleDefinition = {
  role: 'toxicity',
  scoreDomain: { min: 0, max: 100, unit: 'percent of cells remaining after 10 uM exposure' },
  allowedTools: TOXICITY_TOOLS,
  objective:
    'You estimate the percent of primary human ventricular fibroblasts remaining after a 10 uM dose of the compound (DMSO vehicle) in a screening assay.',
  guidance: [
    'Weigh cytotoxicity data (IC50/CC50 in mammalian cells) against the 10 uM screening concentration.',
    'Antiproliferative and cytotoxic mechanisms (tubulin, topoisomerase, proteasome, HSP90) predict low cell counts.',
    'Regulatory warnings and GHS hazards indicate systemic toxicity but say little about fibroblast viability at 10 uM.',
    'Check past screening compounds ranked by percent_remaining_cells, and structural analogs, for measured viability.',
    'Lower your confidence when no cell-based data exists.',
  ],
};

/** Restrict each role's tool set to what is actually registered. */
export function buildAgentRoles(registry: ToolRegistry): Record<AgentRole, AgentRoleDefinition> {
  const available = (role: AgentRoleDefinition): AgentRoleDefinition => ({
    ...role,
    allowedTools: role.allowedTools.filter((name) => registry.has(name)),
  });
  return { efficacy: available(EFFICACY_ROLE), toxicity: available(TOXICITY_ROLE) };
}
