import type { AppConfig } from '../../shared/config/env';
import type { ToolRegistry } from '../gateway/toolRegistry';
import type { LabHistorySource } from '../history/labHistoryStore';
import type { RunArchive } from '../history/runArchive';
import { registerChemblTools } from './chembl';
import { registerLabHistoryTools } from './labHistory';
import { registerLiteratureTools } from './literature';
import { registerPubChemTools } from './pubchem';

export interface DefaultToolDeps {
  labHistory: LabHistorySource;
  runArchive?: RunArchive;
}

/** Register every built-in capability; web search only when a key is configured. */
export function registerDefaultTools(registry: ToolRegistry, config: AppConfig, deps: DefaultToolDeps): void {
  registerChemblTools(registry, { baseUrl: config.CHEMBL_BASE_URL });
  registerPubChemTools(registry, { baseUrl: config.PUBCHEM_BASE_URL });
  registerLiteratureTools(registry, {
    pubmedBaseUrl: config.PUBMED_BASE_URL,
    ncbiApiKey: config.NCBI_API_KEY,
    tavilySearchUrl: config.TAVILY_SEARCH_URL,
    tavilyApiKey: config.TAVILY_API_KEY,
  });
  registerLabHistoryTools(registry, { store: deps.labHistory, archive: deps.runArchive });
}
