import { z } from 'zod';
import type { LLMChatMessage, LLMClient } from '../llm/llm-types';
import { parseJsonLenient } from '../llm/json-output';
import type { CompositeResult, CompoundIdentity, LeafAgentResult } from '../agentRuntime/agent-types';
import { renderPromptBlocks } from '../agentRuntime/promptBlocks';
import { AppError } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';

const stepSchema = z.object({
  index: z.number().int().min(0),
  thought: z.string(),
  toolName: z.string().optional(),
  observation: z.string().optional(),
  recordedAt: z.string(),
});

function leafSchema(role: 'efficacy' | 'toxicity') {
  return z
    .object({
      role: z.literal(role),
      predictedScore: z.number().finite(),
      scoreDomain: z.object({ min: z.number(), max: z.number(), unit: z.string() }),
      confidence: z.number().min(0).max(1),
      reasoning: z.string().trim().min(1),
      degraded: z.boolean(),
      trajectory: z.array(stepSchema).min(1),
    })
    .refine((leaf) => leaf.predictedScore >= leaf.scoreDomain.min && leaf.predictedScore <= leaf.scoreDomain.max, {
      message: 'predictedScore is outside its score domain',
      path: ['predictedScore'],
    });
}

const efficacyLeafSchema = leafSchema('efficacy');
const toxicityLeafSchema = leafSchema('toxicity');

const fusionSchema = z.object({
  priorityScore: z.number().finite(),
  confidence: z.number().finite(),
  reasoning: z.string().trim().min(1),
});

type Fusion = z.infer<typeof fusionSchema>;

const OUTPUT_FORMAT =
  'Respond with ONE JSON object: {"priorityScore": <0..1>, "confidence": <0..1>, "reasoning": "<justification>"}';

export interface CoordinatorOptions {
  client: LLMClient;
  model?: string;
  temperature?: number;
}

export interface CoordinateInput {
  compound: CompoundIdentity;
  efficacy?: LeafAgentResult;
  toxicity?: LeafAgentResult;
}

function describeLeaf(leaf: LeafAgentResult, label: string): string {
  return [
    `${label}: ${leaf.predictedScore} (${leaf.scoreDomain.unit}, range ${leaf.scoreDomain.min}-${leaf.scoreDomain.max})`,
    `Confidence: ${leaf.confidence}${leaf.degraded ? ' (degraded: step budget exhausted)' : ''}`,
    `Reasoning: ${leaf.reasoning}`,
  ].join('\n');
}

/** Fuses the efficacy and toxicity assessments into one priority score. */
export class Coordinator {
  constructor(private readonly options: CoordinatorOptions) {}

  async coordinate(input: CoordinateInput, signal?: AbortSignal): Promise<CompositeResult> {
    const efficacy = efficacyLeafSchema.safeParse(input.efficacy);
    const toxicity = toxicityLeafSchema.safeParse(input.toxicity);
    if (!input.efficacy || !input.toxicity || !efficacy.success || !toxicity.success) {
      const missing = [
        !efficacy.success ? `efficacy (${efficacy.error.issues[0]?.message ?? 'invalid'})` : null,
        !toxicity.success ? `toxicity (${toxicity.error.issues[0]?.message ?? 'invalid'})` : null,
      ].filter((entry): entry is string => entry !== null);
      throw new AppError('INCOMPLETE_INPUT', `Coordinator needs both leaf results; bad: ${missing.join(', ')}`, undefined, {
        missing,
      });
    }

    const messages: LLMChatMessage[] = [
      {
        role: 'system',
        content: renderPromptBlocks([
          {
            title: 'Role',
            content:
              'You prioritize compounds for cardiac fibrosis therapeutic development by combining an efficacy assessment and a toxicity screening assessment.',
            priority: 100,
          },
          {
            title: 'Scoring',
            content:
              'priorityScore is within [0, 1]; higher means higher priority. A compound that reverses fibrosis but leaves few cells alive is a poor candidate. confidence is within [0, 1] and reflects the confidence of both assessments.',
            priority: 50,
          },
          { title: 'Output', content: OUTPUT_FORMAT, priority: 10 },
        ]),
      },
      {
        role: 'user',
        content: `Compound: ${input.compound.name}\n\n${describeLeaf(input.efficacy, 'Efficacy score')}\n\n${describeLeaf(input.toxicity, 'Percent remaining cells')}`,
      },
    ];

    const fusion = await this.requestFusion(messages, signal);
    logger.info(
      { compound: input.compound.name, priorityScore: fusion.priorityScore, confidence: fusion.confidence },
      '[Coordinator] Fused',
    );

    return {
      compound: input.compound,
      priorityScore: fusion.priorityScore,
      confidence: fusion.confidence,
      reasoning: fusion.reasoning,
      leaves: { efficacy: input.efficacy, toxicity: input.toxicity },
    };
  }

  private async requestFusion(messages: LLMChatMessage[], signal?: AbortSignal): Promise<Fusion> {
    let lastFailure: AppError | undefined;
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const response = await this.options.client.chat({
        messages: [...messages],
        model: this.options.model,
        temperature: this.options.temperature ?? 0.2,
        responseFormat: 'json_object',
        signal,
      });

      const parsed = fusionSchema.safeParse(parseJsonLenient(response.content));
      if (!parsed.success) {
        lastFailure = new AppError('MODEL_OUTPUT_INVALID', 'Coordinator output could not be parsed', parsed.error);
      } else if (!inUnitInterval(parsed.data.priorityScore) || !inUnitInterval(parsed.data.confidence)) {
        lastFailure = new AppError(
          'OUT_OF_RANGE_RESULT',
          `Coordinator answered priorityScore ${parsed.data.priorityScore} / confidence ${parsed.data.confidence} outside [0, 1]`,
          undefined,
          { priorityScore: parsed.data.priorityScore, confidence: parsed.data.confidence },
        );
      } else {
        return parsed.data;
      }

      logger.warn({ code: lastFailure.code, attempt }, '[Coordinator] Invalid fusion output');
      messages.push(
        { role: 'assistant', content: response.content },
        { role: 'user', content: `That answer was invalid (${lastFailure.message}). ${OUTPUT_FORMAT}` },
      );
    }
    throw lastFailure ?? new AppError('MODEL_OUTPUT_INVALID', 'Coordinator produced no output');
  }
}

function inUnitInterval(value: number): boolean {
  return value >= 0 && value <= 1;
}
