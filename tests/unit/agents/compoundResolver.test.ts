import { describe, expect, it, vi } from 'vitest';
import { GatewayCompoundResolver, normalizeCompoundName } from '../../../src/core/agents/compoundResolver';
import { ProviderCallError } from '../../../src/core/gateway/providerErrors';
import { buildTestGateway } from '../support/agentFixtures';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, childLogger: () => log };
});

describe('normalizeCompoundName', () => {
  it('collapses whitespace', () => {
    expect(normalizeCompoundName('  valproic   acid ')).toBe('valproic acid');
  });

  it('rejects empty and oversized names', () => {
    expect(() => normalizeCompoundName('   ')).toThrow(expect.objectContaining({ code: 'INCOMPLETE_INPUT' }));
    expect(() => normalizeCompoundName('x'.repeat(201))).toThrow(
      expect.objectContaining({ message: 'Compound name exceeds 200 characters' }),
    );
  });
});

describe('GatewayCompoundResolver', () => {
  it('fails with COMPOUND_NOT_FOUND before any enrichment', async () => {
    const { gateway, search } = buildTestGateway({ cids: async () => [] });

    await expect(new GatewayCompoundResolver(gateway).resolve('unobtainium')).rejects.toMatchObject({
      code: 'COMPOUND_NOT_FOUND',
      message: 'No compound matches "unobtainium"',
    });
    expect(search).not.toHaveBeenCalled();
  });

  it('enriches the identity from the compound search', async () => {
    const { gateway, cids } = buildTestGateway({
      search: async () => ({
        molecules: [{ chemblId: 'CHEMBL25', name: 'ASPIRIN', maxPhase: 4, type: 'Small molecule', synonyms: ['Acetylsalicylic acid'] }],
      }),
    });

    await expect(new GatewayCompoundResolver(gateway).resolve(' aspirin ')).resolves.toEqual({
      query: 'aspirin',
      name: 'ASPIRIN',
      pubchemCid: 2244,
      chemblId: 'CHEMBL25',
      synonyms: ['Acetylsalicylic acid'],
    });
    expect(cids).toHaveBeenCalledWith('aspirin');
  });

  it('keeps the PubChem identity when enrichment fails', async () => {
    const { gateway } = buildTestGateway({
      search: async () => {
        throw new ProviderCallError('HTTP 400 from ChEMBL', { status: 400 });
      },
    });

    await expect(new GatewayCompoundResolver(gateway).resolve('aspirin')).resolves.toEqual({
      query: 'aspirin',
      name: 'aspirin',
      pubchemCid: 2244,
      synonyms: [],
    });
  });
});
