/**
 * Canonical runtime shapes shared by leaf agents, the coordinator and the
 * prioritization entry point.
 */

export type AgentRole = 'efficacy' | 'toxicity';

export type LoopState = 'THINKING' | 'ACTING' | 'OBSERVING' | 'FINISHED';

export interface ScoreDomain {
  min: number;
  max: number;
  /** Human-readable unit, rendered into prompts. */
  unit: string;
}

export interface TrajectoryStep {
  readonly index: number;
  readonly thought: string;
  /** Absent on the terminal finish step. */
  readonly toolName?: string;
  readonly toolArguments?: unknown;
  readonly observation?: string;
  readonly recordedAt: string;
}

export type Trajectory = readonly TrajectoryStep[];

export interface CompoundIdentity {
  /** The name the caller asked about. */
  query: string;
  name: string;
  pubchemCid?: number;
  chemblId?: string;
  synonyms: string[];
}

export interface LeafAgentResult {
  role: AgentRole;
  predictedScore: number;
  scoreDomain: ScoreDomain;
  confidence: number;
  reasoning: string;
  /** True when the step budget ran out and the score was extracted afterwards. */
  degraded: boolean;
  trajectory: Trajectory;
}

export interface CompositeResult {
  compound: CompoundIdentity;
  priorityScore: number;
  confidence: number;
  reasoning: string;
  leaves: {
    efficacy: LeafAgentResult;
    toxicity: LeafAgentResult;
  };
}

export interface AgentRoleDefinition {
  role: AgentRole;
  scoreDomain: ScoreDomain;
  /** Tool names this role may call; anything else is UNKNOWN_TOOL. */
  allowedTools: readonly string[];
  objective: string;
  guidance: readonly string[];
}
