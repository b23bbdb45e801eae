/**
 * E2E test helpers.
 *
 * Builds a full run (operator, solve tool, orchestrator) on top of the
 * scripted page automation and a scripted reasoner. Nothing leaves the
 * process.
 */

import { PageOperatorAgent } from '../../src/agents/PageOperatorAgent.js';
import { ReasoningAgent } from '../../src/agents/ReasoningAgent.js';
import type { QuestionLocator } from '../../src/agents/types.js';
import { ScriptedPageAutomation, type ScriptedAutomationConfig, type ScriptedQuestion } from '../../src/automation/scripted.js';
import type { RunEvent } from '../../src/events/RunEventTypes.js';
import { QuizOrchestrator } from '../../src/orchestrator/QuizOrchestrator.js';
import { SolveTool } from '../../src/solver/SolveTool.js';
import { ScriptedModelClient, ScriptedQuestionLocator, type ScriptedReply } from '../fixtures/scripted.js';

export interface TestRunOptions extends Omit<ScriptedAutomationConfig, 'pages'> {
  maxIterations?: number;
  maxActionAttempts?: number;
  /** Replaces the scripted locator the operator uses */
  operatorLocator?: QuestionLocator;
}

export function buildRun(pages: ScriptedAutomationConfig['pages'], replies: ScriptedReply[], options: TestRunOptions = {}) {
  const { maxIterations = 50, maxActionAttempts = 3, operatorLocator, ...automationConfig } = options;

  const automation = new ScriptedPageAutomation({ pages, ...automationConfig });
  const locator = new ScriptedQuestionLocator(automation);
  const operator = new PageOperatorAgent(automation, operatorLocator ?? locator, {
    actionTimeoutMs: 1_000,
    perceptionTimeoutMs: 1_000,
    maxActionAttempts,
  });

  const reasoner = new ScriptedModelClient(replies);
  const solver = new SolveTool(new ReasoningAgent(reasoner), { transportRetries: 1, timeoutMs: 1_000, backoffMs: 0 });
  const orchestrator = new QuizOrchestrator(operator, solver, { maxIterations });

  const events: RunEvent[] = [];
  const solveEvents: RunEvent[] = [];
  orchestrator.on((event) => events.push(event));
  solver.on((event) => solveEvents.push(event));

  return { automation, locator, operator, reasoner, solver, orchestrator, events, solveEvents };
}

export function mcq(prompt: string, options: string[] = ['Alpha', 'Beta', 'Gamma', 'Delta']): ScriptedQuestion {
  return { prompt, kind: 'multiple_choice', options };
}

export function eventTypes(events: RunEvent[]): string[] {
  return events.map((event) => event.type);
}
