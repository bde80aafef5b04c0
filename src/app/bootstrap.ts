import type http from 'node:http';
import { config as defaultConfig, type AppConfig } from '../shared/config/env';
import { createToolGateway, ToolRegistry, type ToolGateway } from '../core/gateway';
import { createLLMClient } from '../core/llm';
import { registerDefaultTools } from '../core/providers';
import { JsonLabHistoryStore } from '../core/history/labHistoryStore';
import { JsonlRunArchive, type RunArchive } from '../core/history/runArchive';
import { GoalDirectedSummarizer } from '../core/agentRuntime/goalSummarizer';
import { buildAgentRoles } from '../core/agents/agentRoles';
import { GatewayCompoundResolver } from '../core/agents/compoundResolver';
import { Coordinator } from '../core/agents/coordinator';
import { CompoundPrioritizer } from '../core/agents/prioritizer';
import { registerShutdownHooks } from '../core/runtime/shutdown';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';
import { closeServer, createHttpServer, listen } from './httpServer';

export interface AppServices {
  config: AppConfig;
  gateway: ToolGateway;
  prioritizer: CompoundPrioritizer;
  archive?: RunArchive;
}

/** Composition root: one gateway, one model client pair and one prioritizer per process. */
export function createAppServices(config: AppConfig = defaultConfig): AppServices {
  const registry = new ToolRegistry();
  const archive = config.RUN_ARCHIVE_PATH.trim() ? new JsonlRunArchive(config.RUN_ARCHIVE_PATH) : undefined;
  registerDefaultTools(registry, config, {
    labHistory: new JsonLabHistoryStore(config.LAB_HISTORY_PATH),
    runArchive: archive,
  });
  const gateway = createToolGateway(config, registry);

  const client = createLLMClient(config);
  const summarizer = config.SUMMARIZER_ENABLED
    ? new GoalDirectedSummarizer({
        client: createLLMClient(config, { model: config.SUMMARIZER_MODEL }),
        model: config.SUMMARIZER_MODEL,
        minChars: config.SUMMARIZER_MIN_CHARS,
      })
    : undefined;

  const prioritizer = new CompoundPrioritizer({
    gateway,
    client,
    resolver: new GatewayCompoundResolver(gateway),
    coordinator: new Coordinator({ client, model: config.CHAT_MODEL }),
    roles: buildAgentRoles(registry),
    summarizer,
    archive,
    model: config.CHAT_MODEL,
    loopConfig: {
      maxSteps: config.AGENT_MAX_STEPS,
      maxRecoveries: config.AGENT_MAX_RECOVERIES,
      degradedConfidenceFactor: config.AGENT_DEGRADED_CONFIDENCE_FACTOR,
      observationMaxChars: config.AGENT_OBSERVATION_MAX_CHARS,
      summarize: config.SUMMARIZER_ENABLED,
    },
    timeoutMs: config.PRIORITIZE_TIMEOUT_MS,
  });

  logger.info(
    { tools: registry.listNames(), summarizer: config.SUMMARIZER_ENABLED, archive: Boolean(archive) },
    'Compound prioritizer ready',
  );
  if (!config.LLM_API_KEY) {
    logger.warn('No LLM API key found. Requests will be sent without authorization.');
  }

  return { config, gateway, prioritizer, archive };
}

export async function bootstrapApp(): Promise<http.Server> {
  try {
    const services = createAppServices();
    const server = createHttpServer(services.prioritizer, { allowedOrigins: services.config.CORS_ALLOWED_ORIGINS });
    await listen(server, services.config.HTTP_HOST, services.config.HTTP_PORT);
    registerShutdownHooks({ server, closeServer, disposables: [services.gateway] });
    logger.info({ host: services.config.HTTP_HOST, port: services.config.HTTP_PORT }, 'HTTP server listening');
    return server;
  } catch (error) {
    throw new AppError('BOOTSTRAP_FAILED', 'Application bootstrap failed', error);
  }
}
