import type { Logger } from 'pino';
import type { LLMChatMessage, LLMClient } from '../llm/llm-types';
import type { ToolGateway } from '../gateway/toolGateway';
import { AppError, isAppErrorCode } from '../../shared/errors/app-error';
import { abortReason } from '../../shared/async/resilience';
import { childLogger } from '../../shared/logging/logger';
import type { AgentRoleDefinition, CompoundIdentity, LeafAgentResult, LoopState } from './agent-types';
import {
  DECISION_FORMAT,
  parseAgentDecision,
  parseFinalAnswer,
  RETRY_PROMPT,
  type AgentDecision,
  type DecisionParseResult,
  type FinalAnswer,
  type ToolDecision,
} from './decisionParser';
import { serializeToolResult, type GoalDirectedSummarizer } from './goalSummarizer';
import { renderPromptBlocks, toolCatalogBlock } from './promptBlocks';
import { TrajectoryRecorder } from './trajectory';

/** Configure the step budget and recovery behavior of one leaf agent. */
export interface ReasoningActLoopConfig {
  /** Tool steps before the loop falls back to a degraded extraction. */
  maxSteps: number;
  /** UNKNOWN_TOOL / INVALID_TOOL_CALL errors absorbed per run. */
  maxRecoveries: number;
  degradedConfidenceFactor: number;
  observationMaxChars: number;
  temperature: number;
  /** Route results through the summarizer when the agent states a goal. */
  summarize: boolean;
}

const DEFAULT_CONFIG: ReasoningActLoopConfig = {
  maxSteps: 5,
  maxRecoveries: 2,
  degradedConfidenceFactor: 0.5,
  observationMaxChars: 6_000,
  temperature: 0.3,
  summarize: true,
};

export interface ReasoningActLoopParams {
  role: AgentRoleDefinition;
  compound: CompoundIdentity;
  client: LLMClient;
  gateway: ToolGateway;
  summarizer?: GoalDirectedSummarizer;
  traceId: string;
  model?: string;
  signal?: AbortSignal;
  deadlineAt?: number;
  config?: Partial<ReasoningActLoopConfig>;
}

const RECOVERABLE_CODES = ['UNKNOWN_TOOL', 'INVALID_TOOL_CALL'] as const;

const ANSWER_FORMAT = '{"score": <number>, "confidence": <0..1>, "reasoning": "<justification>"}';

function getValidatedConfig(overrides: Partial<ReasoningActLoopConfig> = {}): ReasoningActLoopConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  if (!Number.isInteger(config.maxSteps) || config.maxSteps < 1) {
    throw new RangeError('maxSteps must be a positive integer');
  }
  if (!Number.isInteger(config.maxRecoveries) || config.maxRecoveries < 0) {
    throw new RangeError('maxRecoveries must be a non-negative integer');
  }
  if (!(config.degradedConfidenceFactor >= 0 && config.degradedConfidenceFactor <= 1)) {
    throw new RangeError('degradedConfidenceFactor must be within [0, 1]');
  }
  if (!Number.isInteger(config.observationMaxChars) || config.observationMaxChars < 1) {
    throw new RangeError('observationMaxChars must be a positive integer');
  }
  return config;
}

function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  const headChars = Math.floor(maxChars * 0.7);
  const tailChars = Math.floor(maxChars * 0.2);
  const omittedChars = value.length - headChars - tailChars;
  return `${value.slice(0, headChars).trimEnd()}\n[... ${omittedChars} chars omitted ...]\n${value.slice(-tailChars).trimStart()}`;
}

function describeIdentity(compound: CompoundIdentity): string {
  const lines = [`Compound: ${compound.name}`];
  if (compound.query !== compound.name) lines.push(`Requested as: ${compound.query}`);
  if (compound.pubchemCid !== undefined) lines.push(`PubChem CID: ${compound.pubchemCid}`);
  if (compound.chemblId) lines.push(`ChEMBL ID: ${compound.chemblId}`);
  if (compound.synonyms.length > 0) lines.push(`Synonyms: ${compound.synonyms.slice(0, 8).join(', ')}`);
  return lines.join('\n');
}

class ReasoningActRun {
  private readonly config: ReasoningActLoopConfig;
  private readonly recorder = new TrajectoryRecorder();
  private readonly messages: LLMChatMessage[];
  private readonly log: Logger;
  private recoveries = 0;
  private rangeReprompted = false;

  constructor(private readonly params: ReasoningActLoopParams) {
    this.config = getValidatedConfig(params.config);
    this.log = childLogger({ traceId: params.traceId, role: params.role.role, compound: params.compound.name });
    this.messages = [
      { role: 'system', content: this.buildSystemPrompt() },
      {
        role: 'user',
        content: `${describeIdentity(params.compound)}\n\nInvestigate this compound and predict its ${params.role.role} score.`,
      },
    ];
  }

  async run(): Promise<LeafAgentResult> {
    let state: LoopState = 'THINKING';
    let pending: ToolDecision | undefined;
    let observation = '';
    let result: LeafAgentResult | undefined;

    for (;;) {
      this.assertNotAborted();

      switch (state) {
        case 'THINKING': {
          if (this.recorder.toolStepCount >= this.config.maxSteps) {
            result = await this.finishDegraded();
            state = 'FINISHED';
            break;
          }
          const decision = await this.think();
          if (decision.action === 'finish') {
            if (!this.inRange(decision.result)) {
              this.handleOutOfRange(decision.result, 'decision');
              continue;
            }
            result = this.finish(decision.thought || decision.result.reasoning, decision.result, false);
            state = 'FINISHED';
            break;
          }
          pending = decision;
          state = 'ACTING';
          break;
        }

        case 'ACTING': {
          if (!pending) throw new Error('ACTING without a pending tool decision');
          observation = await this.act(pending);
          state = 'OBSERVING';
          break;
        }

        case 'OBSERVING': {
          if (!pending) throw new Error('OBSERVING without a pending tool decision');
          this.recorder.append({
            thought: pending.thought,
            toolName: pending.tool,
            toolArguments: pending.args,
            observation,
          });
          this.messages.push(
            { role: 'assistant', content: JSON.stringify(pending) },
            { role: 'user', content: `Observation from ${pending.tool}:\n${observation}` },
          );
          pending = undefined;
          state = 'THINKING';
          break;
        }

        case 'FINISHED':
          if (!result) throw new Error('FINISHED without a result');
          return result;
      }
    }
  }

  private buildSystemPrompt(): string {
    const { role, gateway } = this.params;
    const domain = role.scoreDomain;
    return renderPromptBlocks([
      { title: 'Role', content: role.objective, priority: 100 },
      {
        title: 'Score',
        content: `Report "score" within [${domain.min}, ${domain.max}] (${domain.unit}) and "confidence" within [0, 1].`,
        priority: 90,
      },
      { title: 'Guidance', content: role.guidance.map((line) => `- ${line}`).join('\n'), priority: 80 },
      toolCatalogBlock(gateway.describeTools(role.allowedTools)),
      {
        title: 'Protocol',
        content: `Call at most one tool per turn. You have ${this.config.maxSteps} tool calls.\n${DECISION_FORMAT}`,
        priority: 10,
      },
    ]);
  }

  private async complete(): Promise<string> {
    const response = await this.params.client.chat({
      messages: [...this.messages],
      model: this.params.model,
      temperature: this.config.temperature,
      responseFormat: 'json_object',
      signal: this.params.signal,
    });
    return response.content;
  }

  /** One model turn, re-prompted once when the output does not parse. */
  private async requestParsed<T>(parse: (text: string) => DecisionParseResult<T>, retryPrompt: string): Promise<T> {
    const first = await this.complete();
    const parsed = parse(first);
    if (parsed.ok) return parsed.value;

    this.log.warn({ error: parsed.error }, '[Agent] Unparseable decision; re-prompting');
    this.messages.push({ role: 'assistant', content: first }, { role: 'user', content: retryPrompt });

    const second = await this.complete();
    const reparsed = parse(second);
    if (reparsed.ok) return reparsed.value;

    throw new AppError('MODEL_OUTPUT_INVALID', `Agent output could not be parsed: ${reparsed.error}`, undefined, {
      role: this.params.role.role,
    });
  }

  private think(): Promise<AgentDecision> {
    return this.requestParsed(parseAgentDecision, RETRY_PROMPT);
  }

  private async act(decision: ToolDecision): Promise<string> {
    const { role, gateway, summarizer, signal, deadlineAt, traceId } = this.params;
    try {
      if (!role.allowedTools.includes(decision.tool)) {
        throw new AppError(
          'UNKNOWN_TOOL',
          `Tool "${decision.tool}" is not available to the ${role.role} agent. Allowed tools: ${role.allowedTools.join(', ')}`,
          undefined,
          { toolName: decision.tool },
        );
      }

      const invocation = await gateway.invoke(decision.tool, decision.args, { signal, deadlineAt, traceId });
      this.log.debug(
        { toolName: decision.tool, cached: invocation.cached, latencyMs: invocation.latencyMs },
        '[Agent] Tool result',
      );

      let text: string;
      if (decision.goal && summarizer && this.config.summarize) {
        text = (await summarizer.summarize(invocation.result, decision.goal, signal)).digest;
      } else {
        text = serializeToolResult(invocation.result);
      }
      return truncateText(text, this.config.observationMaxChars);
    } catch (error) {
      if (!isAppErrorCode(error, ...RECOVERABLE_CODES)) throw error;
      this.recoveries += 1;
      if (this.recoveries > this.config.maxRecoveries) {
        this.log.warn({ code: error.code, recoveries: this.recoveries }, '[Agent] Recovery budget exhausted');
        throw error;
      }
      this.log.info({ code: error.code, toolName: decision.tool }, '[Agent] Recoverable tool error');
      return `ERROR ${error.code}: ${error.message}`;
    }
  }

  private inRange(answer: FinalAnswer): boolean {
    const { min, max } = this.params.role.scoreDomain;
    return answer.score >= min && answer.score <= max && answer.confidence >= 0 && answer.confidence <= 1;
  }

  /**
   * Throw OUT_OF_RANGE_RESULT on the second offence; otherwise queue a
   * correction that restates the format the model is currently answering in.
   */
  private handleOutOfRange(answer: FinalAnswer, format: 'decision' | 'answer'): void {
    const { min, max, unit } = this.params.role.scoreDomain;
    if (this.rangeReprompted) {
      throw new AppError(
        'OUT_OF_RANGE_RESULT',
        `${this.params.role.role} agent answered score ${answer.score} / confidence ${answer.confidence} outside [${min}, ${max}] / [0, 1]`,
        undefined,
        { role: this.params.role.role, score: answer.score, confidence: answer.confidence },
      );
    }
    this.rangeReprompted = true;
    this.log.warn({ score: answer.score, confidence: answer.confidence }, '[Agent] Out-of-range answer; re-prompting');
    const bounds = `That answer is out of range. "score" must be within [${min}, ${max}] (${unit}) and "confidence" within [0, 1].`;
    if (format === 'decision') {
      this.messages.push(
        { role: 'assistant', content: JSON.stringify({ action: 'finish', result: answer }) },
        { role: 'user', content: `${bounds}\n${DECISION_FORMAT}` },
      );
    } else {
      this.messages.push(
        { role: 'assistant', content: JSON.stringify(answer) },
        { role: 'user', content: `${bounds}\nOutput ONLY this JSON object: ${ANSWER_FORMAT}` },
      );
    }
  }

  private async finishDegraded(): Promise<LeafAgentResult> {
    this.log.warn({ maxSteps: this.config.maxSteps }, '[Agent] Step budget exhausted; extracting best-effort answer');
    const extractionPrompt =
      `You have used all ${this.config.maxSteps} tool calls. Do not call any more tools. ` +
      `Give your best final answer from the observations so far as JSON: ${ANSWER_FORMAT}`;
    this.messages.push({ role: 'user', content: extractionPrompt });

    const retryPrompt = `${extractionPrompt}\nOutput ONLY that JSON object.`;
    let answer = await this.requestParsed(parseFinalAnswer, retryPrompt);
    if (!this.inRange(answer)) {
      this.handleOutOfRange(answer, 'answer');
      answer = await this.requestParsed(parseFinalAnswer, retryPrompt);
      if (!this.inRange(answer)) this.handleOutOfRange(answer, 'answer');
    }

    const degraded: FinalAnswer = {
      ...answer,
      confidence: answer.confidence * this.config.degradedConfidenceFactor,
    };
    return this.finish(`Step budget of ${this.config.maxSteps} tool calls exhausted; best-effort answer extracted.`, degraded, true);
  }

  private finish(thought: string, answer: FinalAnswer, degraded: boolean): LeafAgentResult {
    const trajectory = this.recorder.finish(thought);
    this.log.info(
      { score: answer.score, confidence: answer.confidence, degraded, steps: trajectory.length },
      '[Agent] Finished',
    );
    return {
      role: this.params.role.role,
      predictedScore: answer.score,
      scoreDomain: this.params.role.scoreDomain,
      confidence: answer.confidence,
      reasoning: answer.reasoning,
      degraded,
      trajectory,
    };
  }

  private assertNotAborted(): void {
    const { signal, role } = this.params;
    if (signal?.aborted) throw abortReason(signal, `${role.role} agent`);
  }
}

/**
 * Run one leaf agent through THINKING → ACTING → OBSERVING until it finishes
 * or the step budget runs out.
 *
 * Error behavior:
 * - Unparseable output gets one re-prompt per turn, then MODEL_OUTPUT_INVALID.
 * - UNKNOWN_TOOL and INVALID_TOOL_CALL become error observations up to `maxRecoveries`.
 * - PROVIDER_ERROR, RATE_LIMIT_EXCEEDED and TIMEOUT propagate.
 */
export function runReasoningActLoop(params: ReasoningActLoopParams): Promise<LeafAgentResult> {
  return new ReasoningActRun(params).run();
}
