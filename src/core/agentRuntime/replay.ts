import type { LLMClient, LLMRequest, LLMResponse } from '../llm/llm-types';
import type { ToolGateway } from '../gateway/toolGateway';
import { AppError } from '../../shared/errors/app-error';
import type { AgentRoleDefinition, CompoundIdentity, LeafAgentResult, Trajectory } from './agent-types';
import type { FinalAnswer } from './decisionParser';
import { runReasoningActLoop } from './reactLoop';

export interface ReplayClient extends LLMClient {
  /** Scripted responses not yet consumed. */
  readonly remaining: number;
}

/**
 * A scripted model client that re-issues the recorded tool decisions in
 * order and then the recorded final answer.
 */
export function createReplayClient(trajectory: Trajectory, finalAnswer: FinalAnswer): ReplayClient {
  const script: string[] = [];
  let finishThought = '';
  for (const step of trajectory) {
    if (step.toolName === undefined) {
      finishThought = step.thought;
      continue;
    }
    script.push(
      JSON.stringify({ thought: step.thought, action: 'tool', tool: step.toolName, args: step.toolArguments ?? {} }),
    );
  }
  script.push(JSON.stringify({ thought: finishThought, action: 'finish', result: finalAnswer }));

  let cursor = 0;
  return {
    get remaining() {
      return script.length - cursor;
    },
    async chat(_request: LLMRequest): Promise<LLMResponse> {
      const content = script[cursor];
      if (content === undefined) {
        throw new AppError('MODEL_OUTPUT_INVALID', `Replay script exhausted after ${script.length} responses`);
      }
      cursor += 1;
      return { content, model: 'replay' };
    },
  };
}

export interface ReplayReport {
  result: LeafAgentResult;
  /** True when the replay called the same tools with the same arguments in the same order. */
  actionsMatch: boolean;
}

function actionSignature(trajectory: Trajectory): string[] {
  return trajectory
    .filter((step) => step.toolName !== undefined)
    .map((step) => `${step.toolName}:${JSON.stringify(step.toolArguments ?? {})}`);
}

/**
 * Re-execute a recorded leaf run against a gateway for audit. Summarization
 * is off so observations are the raw (possibly cached) tool results.
 */
export async function replayLeafRun(params: {
  recorded: LeafAgentResult;
  role: AgentRoleDefinition;
  compound: CompoundIdentity;
  gateway: ToolGateway;
  traceId: string;
  signal?: AbortSignal;
}): Promise<ReplayReport> {
  const { recorded } = params;
  const toolSteps = recorded.trajectory.filter((step) => step.toolName !== undefined).length;
  const client = createReplayClient(recorded.trajectory, {
    score: recorded.predictedScore,
    confidence: recorded.confidence,
    reasoning: recorded.reasoning,
  });

  const result = await runReasoningActLoop({
    role: params.role,
    compound: params.compound,
    client,
    gateway: params.gateway,
    traceId: params.traceId,
    signal: params.signal,
    config: {
      summarize: false,
      // One more than recorded so the replay reaches its scripted finish.
      maxSteps: toolSteps + 1,
      maxRecoveries: toolSteps,
    },
  });

  const expected = actionSignature(recorded.trajectory);
  const actual = actionSignature(result.trajectory);
  const actionsMatch = expected.length === actual.length && expected.every((entry, idx) => entry === actual[idx]);
  return { result, actionsMatch };
}
