#!/usr/bin/env node
/**
 * Answer the quiz open in your Chrome.
 *
 * Attaches over CDP to an already-running Chrome, answers every question it
 * finds page by page, then submits. Chrome stays open afterwards.
 *
 * Prerequisites:
 *   1. Chrome started with --remote-debugging-port=9222 and the quiz open
 *   2. An API key for each provider in use (see packages/quizpilot/.env.example)
 *
 * Usage:
 *   npx tsx src/scripts/run.ts -- [--task="only multiple choice"] [--max-iterations=50]
 *
 * Flags:
 *   --task=<text>            (optional) Run directive; defaults to TASK_DESCRIPTION
 *   --max-iterations=<n>     (optional) Iteration budget; defaults to MAX_ITERATIONS
 *   --cdp-url=<url>          (optional) DevTools endpoint; defaults to CDP_URL
 *
 * Exit code is 0 when the quiz was submitted, 1 otherwise.
 */

import { existsSync } from 'node:fs';
import { QuizPilotApp } from '../app.js';
import { parseEnv } from '../config/env.js';
import { ConfigError, errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

// --- Parse args ---

function parseArg(flag: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${flag}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  return value || null;
}

// --- Main ---

async function main(): Promise<number> {
  if (existsSync('.env')) process.loadEnvFile('.env');

  const logger = getLogger();
  const maxIterations = parseArg('max-iterations');
  const cdpUrl = parseArg('cdp-url');

  let app: QuizPilotApp;
  try {
    const env = parseEnv({
      ...process.env,
      ...(maxIterations ? { MAX_ITERATIONS: maxIterations } : {}),
      ...(cdpUrl ? { CDP_URL: cdpUrl } : {}),
    });
    app = new QuizPilotApp({ env });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Configuration error', { error: err.message, missing: err.missingKeys });
      return 1;
    }
    throw err;
  }

  const controller = new AbortController();
  const onSignal = () => {
    logger.warn('Interrupt received, stopping run');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await app.run(parseArg('task') ?? undefined, controller.signal);
    logger.info('Run finished', {
      finalState: result.finalState,
      questionsAnswered: result.questionsAnswered,
      pagesVisited: result.pagesVisited,
      iterationsUsed: result.iterationsUsed,
      skipped: result.skippedQuestions.length,
    });
    return result.finalState === 'Submitted' ? 0 : 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
