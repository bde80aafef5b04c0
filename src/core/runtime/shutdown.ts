import type http from 'node:http';
import { logger } from '../../shared/logging/logger';

type ShutdownSignal = NodeJS.Signals | 'UNHANDLED_REJECTION' | 'UNCAUGHT_EXCEPTION';

interface Disposable {
  dispose(): void;
}

interface RegisterShutdownHooksParams {
  server?: http.Server;
  closeServer?: (server: http.Server) => Promise<void>;
  disposables?: Disposable[];
}

let shutdownInFlight: Promise<void> | null = null;

async function runShutdown(signal: ShutdownSignal, params: RegisterShutdownHooksParams): Promise<void> {
  if (shutdownInFlight) {
    return shutdownInFlight;
  }

  shutdownInFlight = (async () => {
    logger.info({ signal }, 'Shutdown initiated');

    if (params.server && params.closeServer) {
      try {
        await params.closeServer(params.server);
      } catch (error) {
        logger.warn({ error }, 'HTTP server close failed during shutdown');
      }
    }

    for (const disposable of params.disposables ?? []) {
      try {
        disposable.dispose();
      } catch (error) {
        logger.warn({ error }, 'Dispose failed during shutdown');
      }
    }

    logger.info({ signal }, 'Shutdown complete');
  })();

  return shutdownInFlight;
}

export function registerShutdownHooks(params: RegisterShutdownHooksParams): void {
  const handleSignal = (signal: NodeJS.Signals) => {
    void runShutdown(signal, params)
      .catch((error) => {
        logger.error({ error, signal }, 'Fatal shutdown failure');
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.once('SIGINT', () => handleSignal('SIGINT'));
  process.once('SIGTERM', () => handleSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ error: reason }, 'Unhandled promise rejection');
    void runShutdown('UNHANDLED_REJECTION', params)
      .catch((error) => {
        logger.error({ error }, 'Fatal shutdown failure after unhandled rejection');
      })
      .finally(() => {
        process.exit(1);
      });
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    void runShutdown('UNCAUGHT_EXCEPTION', params)
      .catch((shutdownError) => {
        logger.error({ error: shutdownError }, 'Fatal shutdown failure after uncaught exception');
      })
      .finally(() => {
        process.exit(1);
      });
  });
}
