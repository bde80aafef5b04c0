/** Parse and validate the decision envelope a leaf agent emits each THINKING turn. */
import { z } from 'zod';
import { parseJsonLenient } from '../llm/json-output';

const toolDecisionSchema = z.object({
  thought: z.string().trim().min(1),
  action: z.literal('tool'),
  tool: z.string().trim().min(1),
  args: z.record(z.unknown()).default({}),
  /** When present, the raw result is condensed toward this goal before it is observed. */
  goal: z.string().trim().min(1).optional(),
});

const finishDecisionSchema = z.object({
  thought: z.string().default(''),
  action: z.literal('finish'),
  result: z.object({
    score: z.number().finite(),
    confidence: z.number().finite(),
    reasoning: z.string().trim().min(1),
  }),
});

export const agentDecisionSchema = z.discriminatedUnion('action', [toolDecisionSchema, finishDecisionSchema]);

export type AgentDecision = z.infer<typeof agentDecisionSchema>;
export type ToolDecision = z.infer<typeof toolDecisionSchema>;
export type FinishDecision = z.infer<typeof finishDecisionSchema>;

export const finalAnswerSchema = finishDecisionSchema.shape.result;
export type FinalAnswer = z.infer<typeof finalAnswerSchema>;

export type DecisionParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const DECISION_FORMAT = `Respond with ONE JSON object and nothing else, in one of these shapes:
{"thought": "<your reasoning>", "action": "tool", "tool": "<tool_name>", "args": { ... }, "goal": "<what you need from the result>"}
{"thought": "<your reasoning>", "action": "finish", "result": {"score": <number>, "confidence": <0..1>, "reasoning": "<justification>"}}`;

/** Deterministic re-prompt after an unparseable turn. */
export const RETRY_PROMPT = `Your previous response was not a valid decision object.\n${DECISION_FORMAT}`;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseAgentDecision(text: string): DecisionParseResult<AgentDecision> {
  const raw = parseJsonLenient(text);
  if (raw === undefined) return { ok: false, error: 'response contained no JSON object' };
  const parsed = agentDecisionSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, error: describeIssues(parsed.error) };
  return { ok: true, value: parsed.data };
}

/**
 * Parse a bare final answer, as produced by the extraction call after the
 * step budget runs out. A full finish envelope is accepted too.
 */
export function parseFinalAnswer(text: string): DecisionParseResult<FinalAnswer> {
  const raw = parseJsonLenient(text);
  if (raw === undefined) return { ok: false, error: 'response contained no JSON object' };
  const asEnvelope = finishDecisionSchema.safeParse(raw);
  if (asEnvelope.success) return { ok: true, value: asEnvelope.data.result };
  const parsed = finalAnswerSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, error: describeIssues(parsed.error) };
  return { ok: true, value: parsed.data };
}
