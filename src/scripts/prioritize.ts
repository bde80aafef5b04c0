#!/usr/bin/env node
/* eslint-disable no-console */

import { createAppServices } from '../app/bootstrap';
import type { BatchOutcome } from '../core/agents/prioritizer';

const USAGE = 'Usage: prioritize-compound [--json] <compound name> [<compound name> ...]';

function formatOutcome(outcome: BatchOutcome): string {
  if (outcome.status === 'rejected') {
    return `[FAIL] ${outcome.compound}: ${outcome.error.code} ${outcome.error.message}`;
  }
  const { result } = outcome;
  const { efficacy, toxicity } = result.leaves;
  return [
    `[OK] ${outcome.compound}: priority=${result.priorityScore.toFixed(3)} confidence=${result.confidence.toFixed(2)}`,
    `  efficacy=${efficacy.predictedScore} (confidence ${efficacy.confidence}${efficacy.degraded ? ', degraded' : ''})`,
    `  remaining cells=${toxicity.predictedScore}% (confidence ${toxicity.confidence}${toxicity.degraded ? ', degraded' : ''})`,
    `  ${result.reasoning}`,
  ].join('\n');
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const asJson = args.includes('--json');
  const names = args.filter((arg) => arg !== '--json');
  if (names.length === 0) {
    console.error(USAGE);
    return 2;
  }

  const services = createAppServices();
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const outcomes = await services.prioritizer.prioritizeMany(names, {
      maxParallel: services.config.BATCH_MAX_PARALLEL,
      signal: controller.signal,
    });
    if (asJson) {
      console.log(JSON.stringify(outcomes, null, 2));
    } else {
      for (const outcome of outcomes) console.log(formatOutcome(outcome));
    }
    return outcomes.every((outcome) => outcome.status === 'fulfilled') ? 0 : 1;
  } finally {
    services.gateway.dispose();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
