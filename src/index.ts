import { bootstrapApp } from './app/bootstrap';
import { logger } from './shared/logging/logger';

/**
 * Start the HTTP entry point for compound prioritization.
 */
async function main() {
  await bootstrapApp();
}

main().catch((err) => {
  logger.error({ err }, 'Startup failed');
  process.exit(1);
});
