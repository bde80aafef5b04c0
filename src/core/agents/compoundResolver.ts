import { z } from 'zod';
import type { CompoundIdentity } from '../agentRuntime/agent-types';
import type { ToolGateway } from '../gateway/toolGateway';
import { AppError, isAppErrorCode } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';

export interface ResolveOptions {
  signal?: AbortSignal;
  deadlineAt?: number;
  traceId?: string;
}

/** Turns a user-supplied name into a canonical identity before any agent runs. */
export interface CompoundResolver {
  resolve(query: string, options?: ResolveOptions): Promise<CompoundIdentity>;
}

const cidResultSchema = z.object({ cids: z.array(z.number()) });
const chemblSearchSchema = z.object({
  molecules: z.array(
    z.object({
      chemblId: z.string(),
      name: z.string().nullable(),
      synonyms: z.array(z.string()),
    }),
  ),
});

export const MAX_COMPOUND_NAME_LENGTH = 200;

export function normalizeCompoundName(raw: string): string {
  const name = raw.trim().replace(/\s+/g, ' ');
  if (name.length === 0) {
    throw new AppError('INCOMPLETE_INPUT', 'Compound name must not be empty');
  }
  if (name.length > MAX_COMPOUND_NAME_LENGTH) {
    throw new AppError('INCOMPLETE_INPUT', `Compound name exceeds ${MAX_COMPOUND_NAME_LENGTH} characters`);
  }
  return name;
}

/**
 * Resolves through the gateway: PubChem name lookup decides existence,
 * ChEMBL search enriches with an ID and synonyms when it can.
 */
export class GatewayCompoundResolver implements CompoundResolver {
  constructor(private readonly gateway: ToolGateway) {}

  async resolve(query: string, options: ResolveOptions = {}): Promise<CompoundIdentity> {
    const name = normalizeCompoundName(query);

    const lookup = await this.gateway.invoke('search_pubchem_cid', { query: name, limit: 1 }, options);
    const { cids } = cidResultSchema.parse(lookup.result);
    const pubchemCid = cids[0];
    if (pubchemCid === undefined) {
      throw new AppError('COMPOUND_NOT_FOUND', `No compound matches "${name}"`, undefined, { query: name });
    }

    const identity: CompoundIdentity = { query: name, name, pubchemCid, synonyms: [] };

    try {
      const search = await this.gateway.invoke('search_compounds', { query: name, limit: 1 }, options);
      const [molecule] = chemblSearchSchema.parse(search.result).molecules;
      if (molecule) {
        identity.chemblId = molecule.chemblId;
        identity.synonyms = molecule.synonyms;
        if (molecule.name) identity.name = molecule.name;
      }
    } catch (error) {
      if (isAppErrorCode(error, 'TIMEOUT')) throw error;
      logger.warn({ err: error, compound: name, traceId: options.traceId }, '[Resolver] ChEMBL enrichment failed; continuing');
    }

    return identity;
  }
}
