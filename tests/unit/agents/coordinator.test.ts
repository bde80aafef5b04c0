import { describe, expect, it, vi } from 'vitest';
import { Coordinator } from '../../../src/core/agents/coordinator';
import { TEST_COMPOUND, leafResult, scriptedClient } from '../support/agentFixtures';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, childLogger: () => log };
});

const FUSION = '{"priorityScore": 0.62, "confidence": 0.7, "reasoning": "reverses fibrosis and spares most cells"}';

describe('Coordinator', () => {
  it('fuses both leaf results into a composite', async () => {
    const client = scriptedClient(FUSION);
    const efficacy = leafResult({ role: 'efficacy' });
    const toxicity = leafResult({ role: 'toxicity' });

    const result = await new Coordinator({ client }).coordinate({ compound: TEST_COMPOUND, efficacy, toxicity });

    expect(result).toMatchObject({
      compound: TEST_COMPOUND,
      priorityScore: 0.62,
      confidence: 0.7,
      reasoning: 'reverses fibrosis and spares most cells',
    });
    expect(result.leaves.efficacy).toBe(efficacy);
    expect(result.leaves.toxicity).toBe(toxicity);
    const userMessage = client.chat.mock.calls[0][0].messages[1].content;
    expect(userMessage).toContain('Efficacy score: 0.7 (fraction reversed, range 0-1)');
    expect(userMessage).toContain('Percent remaining cells: 85 (percent remaining cells, range 0-100)');
  });

  it('refuses to fuse without both leaves', async () => {
    const client = scriptedClient(FUSION);

    await expect(
      new Coordinator({ client }).coordinate({ compound: TEST_COMPOUND, efficacy: leafResult({ role: 'efficacy' }) }),
    ).rejects.toMatchObject({
      code: 'INCOMPLETE_INPUT',
      message: 'Coordinator needs both leaf results; bad: toxicity (Required)',
    });
    expect(client.chat).not.toHaveBeenCalled();
  });

  it('refuses a leaf whose score is outside its domain', async () => {
    const client = scriptedClient(FUSION);

    await expect(
      new Coordinator({ client }).coordinate({
        compound: TEST_COMPOUND,
        efficacy: leafResult({ role: 'efficacy', predictedScore: 1.4 }),
        toxicity: leafResult({ role: 'toxicity' }),
      }),
    ).rejects.toMatchObject({
      code: 'INCOMPLETE_INPUT',
      message: 'Coordinator needs both leaf results; bad: efficacy (predictedScore is outside its score domain)',
    });
  });

  it('re-asks once after unparseable output', async () => {
    const client = scriptedClient('The compound looks promising.', FUSION);

    const result = await new Coordinator({ client }).coordinate({
      compound: TEST_COMPOUND,
      efficacy: leafResult({ role: 'efficacy' }),
      toxicity: leafResult({ role: 'toxicity' }),
    });

    expect(result.priorityScore).toBe(0.62);
    expect(client.chat).toHaveBeenCalledTimes(2);
  });

  it('fails with OUT_OF_RANGE_RESULT when both answers are out of range', async () => {
    const outOfRange = '{"priorityScore": 1.3, "confidence": 0.5, "reasoning": "very good"}';
    const client = scriptedClient(outOfRange, outOfRange);

    await expect(
      new Coordinator({ client }).coordinate({
        compound: TEST_COMPOUND,
        efficacy: leafResult({ role: 'efficacy' }),
        toxicity: leafResult({ role: 'toxicity' }),
      }),
    ).rejects.toMatchObject({
      code: 'OUT_OF_RANGE_RESULT',
      message: 'Coordinator answered priorityScore 1.3 / confidence 0.5 outside [0, 1]',
    });
  });

  it('fails with MODEL_OUTPUT_INVALID when both answers are unparseable', async () => {
    const client = scriptedClient('no', 'still no');

    await expect(
      new Coordinator({ client }).coordinate({
        compound: TEST_COMPOUND,
        efficacy: leafResult({ role: 'efficacy' }),
        toxicity: leafResult({ role: 'toxicity' }),
      }),
    ).rejects.toMatchObject({ code: 'MODEL_OUTPUT_INVALID' });
  });
});
