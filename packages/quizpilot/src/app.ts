import { PageOperatorAgent } from './agents/PageOperatorAgent.js';
import { ModelQuestionLocator } from './agents/questionLocator.js';
import { ReasoningAgent } from './agents/ReasoningAgent.js';
import type { QuestionLocator } from './agents/types.js';
import { createAutomation, type PageAutomation } from './automation/index.js';
import { loadAppConfig, validateConfig, type AppConfig } from './config/app.js';
import { getEnv, type Env } from './config/env.js';
import { AGENT_ROLES, type AgentRole, type ResolvedModel } from './config/models.js';
import type { RunEventListener } from './events/RunEventTypes.js';
import { createModelClient, printModelInfo } from './llm/factory.js';
import type { ModelClient } from './llm/types.js';
import { getLogger, type Logger } from './monitoring/logger.js';
import { QuizOrchestrator, type RunResult } from './orchestrator/QuizOrchestrator.js';
import { SolveTool } from './solver/SolveTool.js';

export interface QuizPilotAppOptions {
  env?: Env;
  /** Where API keys are looked up; defaults to process.env */
  keys?: Record<string, string | undefined>;
  /** Overrides for tests and embedding */
  automation?: PageAutomation;
  clients?: Partial<Record<AgentRole, ModelClient>>;
  locator?: QuestionLocator;
  logger?: Logger;
}

/**
 * Wires configuration, model clients, both agents, the page automation and
 * the orchestrator into one runnable unit.
 */
export class QuizPilotApp {
  readonly config: AppConfig;
  readonly models: Record<AgentRole, ResolvedModel>;
  readonly orchestrator: QuizOrchestrator;
  private readonly logger: Logger;

  constructor(options: QuizPilotAppOptions = {}) {
    this.logger = options.logger ?? getLogger();
    const env = options.env ?? getEnv();
    const keys = options.keys ?? process.env;
    this.config = loadAppConfig(env);

    // Keys are only required for roles whose client is not supplied
    const keyed = AGENT_ROLES.filter((role) => !options.clients?.[role]);
    this.models = validateConfig(this.config, keys, keyed);
    printModelInfo(this.models.operator);
    printModelInfo(this.models.reasoner);

    const operatorClient = options.clients?.operator ?? createModelClient(this.models.operator, keys);
    const reasonerClient = options.clients?.reasoner ?? createModelClient(this.models.reasoner, keys);
    const { run, browser } = this.config;

    const automation =
      options.automation ??
      createAutomation({ type: 'playwright', cdpUrl: browser.cdpUrl, actionTimeoutMs: run.actionTimeoutMs, logger: this.logger });

    const operator = new PageOperatorAgent(automation, options.locator ?? new ModelQuestionLocator(operatorClient), {
      actionTimeoutMs: run.actionTimeoutMs,
      perceptionTimeoutMs: run.reasonerTimeoutMs,
      maxActionAttempts: run.maxActionAttempts,
      logger: this.logger,
    });

    const solver = new SolveTool(new ReasoningAgent(reasonerClient), {
      transportRetries: run.transportRetries,
      timeoutMs: run.reasonerTimeoutMs,
      backoffMs: run.retryBackoffMs,
      logger: this.logger,
    });
    solver.on((event) => this.logger.debug('Solve event', { event: event.type, ...event.data }));

    this.orchestrator = new QuizOrchestrator(operator, solver, {
      maxIterations: run.maxIterations,
      logger: this.logger,
    });
  }

  onEvent(listener: RunEventListener): void {
    this.orchestrator.on(listener);
  }

  /** Run once. `task` falls back to TASK_DESCRIPTION. */
  run(task?: string, signal?: AbortSignal): Promise<RunResult> {
    return this.orchestrator.run(task ?? this.config.taskDescription, { signal });
  }
}
