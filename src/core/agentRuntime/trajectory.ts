import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import type { Trajectory, TrajectoryStep } from './agent-types';

const TRAJECTORY_FORMAT_VERSION = 1;

export interface ToolStepInput {
  thought: string;
  toolName: string;
  toolArguments: unknown;
  observation: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function copyArguments(args: unknown): unknown {
  return args === undefined ? undefined : structuredClone(args);
}

/**
 * Append-only log of one agent run. Steps get consecutive indices in the
 * order they are appended; once closed the log only reads.
 */
export class TrajectoryRecorder {
  private readonly steps: TrajectoryStep[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of steps that called a tool. */
  get toolStepCount(): number {
    return this.steps.filter((step) => step.toolName !== undefined).length;
  }

  append(input: ToolStepInput): TrajectoryStep {
    this.assertOpen();
    const step: TrajectoryStep = deepFreeze({
      index: this.steps.length,
      thought: input.thought,
      toolName: input.toolName,
      toolArguments: copyArguments(input.toolArguments),
      observation: input.observation,
      recordedAt: new Date().toISOString(),
    });
    this.steps.push(step);
    return step;
  }

  /** Append the terminal step (no tool, no observation) and close. */
  finish(thought: string): Trajectory {
    this.assertOpen();
    this.steps.push(deepFreeze({ index: this.steps.length, thought, recordedAt: new Date().toISOString() }));
    return this.close();
  }

  close(): Trajectory {
    this.closed = true;
    return this.snapshot();
  }

  snapshot(): Trajectory {
    return Object.freeze([...this.steps]);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new AppError('TRAJECTORY_CLOSED', 'Trajectory is closed; no further steps can be appended');
    }
  }
}

const stepSchema = z.object({
  index: z.number().int().min(0),
  thought: z.string(),
  toolName: z.string().min(1).optional(),
  toolArguments: z.unknown().optional(),
  observation: z.string().optional(),
  recordedAt: z.string().datetime(),
});

const trajectoryDocumentSchema = z
  .object({
    version: z.literal(TRAJECTORY_FORMAT_VERSION),
    steps: z.array(stepSchema),
  })
  .superRefine((doc, ctx) => {
    doc.steps.forEach((step, position) => {
      if (step.index !== position) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps', position, 'index'], message: 'indices must be consecutive from 0' });
      }
      const isTerminal = step.toolName === undefined;
      if (isTerminal && step.observation !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps', position], message: 'finish step has no observation' });
      }
      if (isTerminal && position !== doc.steps.length - 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps', position], message: 'finish step must be last' });
      }
    });
  });

export function serializeTrajectory(trajectory: Trajectory): string {
  return JSON.stringify({ version: TRAJECTORY_FORMAT_VERSION, steps: trajectory });
}

/** @throws AppError INCOMPLETE_INPUT when the document is not a valid trajectory. */
export function parseTrajectory(serialized: string): Trajectory {
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (error) {
    throw new AppError('INCOMPLETE_INPUT', 'Trajectory document is not valid JSON', error);
  }
  const parsed = trajectoryDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError('INCOMPLETE_INPUT', `Invalid trajectory: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, parsed.error);
  }
  const steps: TrajectoryStep[] = parsed.data.steps.map((step) => deepFreeze({ ...step }));
  return Object.freeze(steps);
}
