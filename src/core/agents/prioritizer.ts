import { randomUUID } from 'node:crypto';
import type { LLMClient } from '../llm/llm-types';
import type { ToolGateway } from '../gateway/toolGateway';
import type {
  AgentRole,
  AgentRoleDefinition,
  CompositeResult,
  CompoundIdentity,
  LeafAgentResult,
} from '../agentRuntime/agent-types';
import type { GoalDirectedSummarizer } from '../agentRuntime/goalSummarizer';
import { runReasoningActLoop, type ReasoningActLoopConfig } from '../agentRuntime/reactLoop';
import type { RunArchive } from '../history/runArchive';
import { limitConcurrency } from '../utils/concurrency';
import { AppError, toErrorWithCode, type ErrorCode } from '../../shared/errors/app-error';
import { abortReason, raceAbort, withTimeout } from '../../shared/async/resilience';
import { childLogger } from '../../shared/logging/logger';
import type { CompoundResolver } from './compoundResolver';
import type { Coordinator } from './coordinator';

export interface CompoundPrioritizerDeps {
  gateway: ToolGateway;
  client: LLMClient;
  resolver: CompoundResolver;
  coordinator: Coordinator;
  roles: Record<AgentRole, AgentRoleDefinition>;
  summarizer?: GoalDirectedSummarizer;
  archive?: RunArchive;
  model?: string;
  loopConfig?: Partial<ReasoningActLoopConfig>;
  timeoutMs: number;
}

export interface PrioritizeOptions {
  traceId?: string;
  /** External cancellation, e.g. the HTTP client went away. */
  signal?: AbortSignal;
}

export interface LeafFailure {
  role: AgentRole;
  code: ErrorCode;
  message: string;
}

export type BatchOutcome =
  | { compound: string; status: 'fulfilled'; result: CompositeResult }
  | { compound: string; status: 'rejected'; error: { code: ErrorCode; message: string } };

const ROLES: readonly AgentRole[] = ['efficacy', 'toxicity'];

/**
 * Entry point for one compound: resolve identity, run both leaf agents
 * concurrently, then fuse their results.
 */
export class CompoundPrioritizer {
  constructor(private readonly deps: CompoundPrioritizerDeps) {
    if (!Number.isInteger(deps.timeoutMs) || deps.timeoutMs < 1) {
      throw new RangeError('timeoutMs must be a positive integer');
    }
  }

  async prioritize(compoundName: string, options: PrioritizeOptions = {}): Promise<CompositeResult> {
    const traceId = options.traceId ?? randomUUID();
    const controller = new AbortController();
    const external = options.signal;
    const onExternalAbort = () =>
      controller.abort(new AppError('TIMEOUT', `Prioritization of "${compoundName}" was cancelled`));
    if (external?.aborted) onExternalAbort();
    external?.addEventListener('abort', onExternalAbort, { once: true });

    const deadlineAt = Date.now() + this.deps.timeoutMs;
    try {
      // Cancellation settles the call at once; leaves still unwinding are not awaited.
      return await raceAbort(
        withTimeout(
          this.run(compoundName, traceId, controller.signal, deadlineAt),
          this.deps.timeoutMs,
          `prioritize "${compoundName}"`,
          (error) => controller.abort(error),
        ),
        controller.signal,
        `prioritize "${compoundName}"`,
      );
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  /** Evaluate several compounds with bounded parallelism; each settles on its own. */
  async prioritizeMany(names: readonly string[], options: { maxParallel: number; signal?: AbortSignal }): Promise<BatchOutcome[]> {
    const limit = limitConcurrency(options.maxParallel);
    const settled = await Promise.allSettled(
      names.map((name) => limit(() => this.prioritize(name, { signal: options.signal }))),
    );
    return settled.map((outcome, idx): BatchOutcome => {
      const compound = names[idx];
      if (outcome.status === 'fulfilled') return { compound, status: 'fulfilled', result: outcome.value };
      const error = toErrorWithCode(outcome.reason, 'PROVIDER_ERROR');
      return { compound, status: 'rejected', error: { code: error.code, message: error.message } };
    });
  }

  private async run(compoundName: string, traceId: string, signal: AbortSignal, deadlineAt: number): Promise<CompositeResult> {
    if (signal.aborted) throw abortReason(signal, `prioritize "${compoundName}"`);
    const log = childLogger({ traceId, compound: compoundName });
    log.info('[Prioritizer] Started');

    const compound = await this.deps.resolver.resolve(compoundName, { signal, deadlineAt, traceId });
    log.debug({ identity: compound }, '[Prioritizer] Compound resolved');

    const leaves = await this.runLeaves(compound, traceId, signal, deadlineAt);
    const result = await this.deps.coordinator.coordinate({ compound, ...leaves }, signal);

    await this.archive(result, traceId);
    log.info({ priorityScore: result.priorityScore, confidence: result.confidence }, '[Prioritizer] Finished');
    return result;
  }

  private async runLeaves(
    compound: CompoundIdentity,
    traceId: string,
    signal: AbortSignal,
    deadlineAt: number,
  ): Promise<{ efficacy: LeafAgentResult; toxicity: LeafAgentResult }> {
    const settled = await Promise.allSettled(
      ROLES.map((role) =>
        runReasoningActLoop({
          role: this.deps.roles[role],
          compound,
          client: this.deps.client,
          gateway: this.deps.gateway,
          summarizer: this.deps.summarizer,
          model: this.deps.model,
          config: this.deps.loopConfig,
          traceId,
          signal,
          deadlineAt,
        }),
      ),
    );

    const completed: Partial<Record<AgentRole, LeafAgentResult>> = {};
    const failures: LeafFailure[] = [];
    const reasons: unknown[] = [];
    settled.forEach((outcome, idx) => {
      const role = ROLES[idx];
      if (outcome.status === 'fulfilled') {
        completed[role] = outcome.value;
      } else {
        reasons.push(outcome.reason);
        const error = toErrorWithCode(outcome.reason, 'PROVIDER_ERROR');
        failures.push({ role, code: error.code, message: error.message });
      }
    });

    const { efficacy, toxicity } = completed;
    if (failures.length > 0 || !efficacy || !toxicity) {
      // A run abandoned on its deadline surfaces as TIMEOUT, not as a leaf failure.
      if (signal.aborted && failures.every((failure) => failure.code === 'TIMEOUT')) {
        throw toErrorWithCode(signal.reason, 'TIMEOUT');
      }
      throw new AppError(
        'PARTIAL_AGENT_FAILURE',
        `Leaf agent failure for ${compound.name}: ${failures.map((f) => `${f.role} ${f.code}`).join(', ')}`,
        reasons[0],
        {
          causeCodes: failures.map((failure) => failure.code),
          failures,
          completedRoles: Object.keys(completed),
        },
      );
    }
    return { efficacy, toxicity };
  }

  private async archive(result: CompositeResult, traceId: string): Promise<void> {
    if (!this.deps.archive) return;
    try {
      await this.deps.archive.append({ traceId, recordedAt: new Date().toISOString(), result });
    } catch (error) {
      childLogger({ traceId }).warn({ err: error }, '[Prioritizer] Failed to archive run');
    }
  }
}
