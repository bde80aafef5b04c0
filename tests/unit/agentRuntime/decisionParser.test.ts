import { describe, expect, it } from 'vitest';
import { parseAgentDecision, parseFinalAnswer } from '../../../src/core/agentRuntime/decisionParser';

describe('parseAgentDecision', () => {
  it('parses a tool decision and defaults missing args', () => {
    const parsed = parseAgentDecision('{"thought": "search first", "action": "tool", "tool": "search_compounds"}');

    expect(parsed).toEqual({
      ok: true,
      value: { thought: 'search first', action: 'tool', tool: 'search_compounds', args: {} },
    });
  });

  it('parses a fenced finish decision', () => {
    const parsed = parseAgentDecision(
      '```json\n{"thought": "done", "action": "finish", "result": {"score": 0.4, "confidence": 0.6, "reasoning": "weak"}}\n```',
    );

    expect(parsed).toEqual({
      ok: true,
      value: { thought: 'done', action: 'finish', result: { score: 0.4, confidence: 0.6, reasoning: 'weak' } },
    });
  });

  it('finds the decision inside surrounding prose', () => {
    const parsed = parseAgentDecision(
      'Here is my decision: {"thought": "t", "action": "tool", "tool": "get_molecule_info", "args": {"chembl_id": "CHEMBL25"}} thanks',
    );

    expect(parsed.ok && parsed.value.action === 'tool' && parsed.value.args).toEqual({ chembl_id: 'CHEMBL25' });
  });

  it('reports schema problems', () => {
    expect(parseAgentDecision('{"thought": "t", "action": "dance"}')).toMatchObject({ ok: false });
    expect(parseAgentDecision('{"thought": "t", "action": "finish", "result": {"score": 1}}')).toEqual({
      ok: false,
      error: 'result.confidence: Required; result.reasoning: Required',
    });
  });

  it('reports missing JSON', () => {
    expect(parseAgentDecision('no idea')).toEqual({ ok: false, error: 'response contained no JSON object' });
  });
});

describe('parseFinalAnswer', () => {
  it('accepts a bare answer', () => {
    expect(parseFinalAnswer('{"score": 42, "confidence": 0.5, "reasoning": "moderate"}')).toEqual({
      ok: true,
      value: { score: 42, confidence: 0.5, reasoning: 'moderate' },
    });
  });

  it('accepts a finish envelope', () => {
    expect(
      parseFinalAnswer('{"action": "finish", "result": {"score": 0.1, "confidence": 0.2, "reasoning": "little"}}'),
    ).toEqual({ ok: true, value: { score: 0.1, confidence: 0.2, reasoning: 'little' } });
  });

  it('rejects an answer without reasoning', () => {
    expect(parseFinalAnswer('{"score": 0.1, "confidence": 0.2}')).toEqual({ ok: false, error: 'reasoning: Required' });
  });
});
