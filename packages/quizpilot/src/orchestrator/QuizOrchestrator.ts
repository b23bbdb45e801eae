import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import type { PageOperatorAgent } from '../agents/PageOperatorAgent.js';
import { toHandledQuestion, type HandledQuestion } from '../agents/types.js';
import { errorMessage, QuizPilotError } from '../errors.js';
import { RUN_EVENT_TYPES, type RunEvent, type RunEventListener } from '../events/RunEventTypes.js';
import { throwIfAborted } from '../llm/retry.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { describeFailure, type FailureCause } from '../session/failure.js';
import { IllegalTransitionError, SessionStateMachine } from '../session/SessionStateMachine.js';
import type { SessionStateName } from '../session/types.js';
import type { SolveTool } from '../solver/SolveTool.js';
import { describeAnswerValue } from '../solver/types.js';
import { parseRunDirective, type RunDirective } from './directive.js';

export interface OrchestratorOptions {
  maxIterations: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface SkippedQuestion {
  pageIndex: number;
  prompt: string;
  kind: string;
}

export interface RunResult {
  runId: string;
  finalState: SessionStateName;
  questionsAnswered: number;
  pagesVisited: number;
  iterationsUsed: number;
  skippedQuestions: SkippedQuestion[];
  failureCause?: FailureCause;
}

/**
 * Drives one run: the operator finds a question, the solve tool answers it,
 * the operator applies the answer, and the state machine decides whether to
 * stay on the page, paginate or submit. Every error ends the run in Failed.
 */
export class QuizOrchestrator {
  private emitter = new EventEmitter();
  private readonly logger: Logger;
  /** State machine of the latest run */
  private machine: SessionStateMachine | null = null;
  /** Set from the moment a submit is sent until the page answers */
  private submitting = false;
  private signal: AbortSignal | undefined;

  constructor(
    private readonly operator: PageOperatorAgent,
    private readonly solver: SolveTool,
    private readonly options: OrchestratorOptions,
  ) {
    this.logger = options.logger ?? getLogger();
  }

  on(listener: RunEventListener): void {
    this.emitter.on('event', listener);
  }

  off(listener: RunEventListener): void {
    this.emitter.off('event', listener);
  }

  async run(task?: string, runOptions: RunOptions = {}): Promise<RunResult> {
    const runId = randomUUID();
    const logger = this.logger.child({ runId });
    const machine = new SessionStateMachine(this.options.maxIterations);
    const directive = parseRunDirective(task);
    const skipped: SkippedQuestion[] = [];
    this.machine = machine;
    this.signal = runOptions.signal;

    machine.onTransition((event) => logger.debug('State transition', { from: event.from, to: event.to, operation: event.operation }));
    this.emit(RUN_EVENT_TYPES.RUN_STARTED, { runId, directive: directive.text, kinds: [...directive.kinds] });
    logger.info('Run started', { directive: directive.text, maxIterations: this.options.maxIterations });

    try {
      throwIfAborted(this.signal);
      await this.operator.start(directive.text, this.signal);
      await this.loop(machine, directive, skipped, logger);
    } catch (err) {
      machine.fail(describeFailure(err, machine.snapshot().questionsAnswered));
    } finally {
      try {
        await this.operator.stop();
      } catch (err) {
        logger.warn('Failed to detach from page', { error: errorMessage(err) });
      }
      this.signal = undefined;
    }

    const state = machine.snapshot();
    const result: RunResult = {
      runId,
      finalState: state.state,
      questionsAnswered: state.questionsAnswered,
      pagesVisited: state.pageIndex + 1,
      iterationsUsed: state.iterationsUsed,
      skippedQuestions: skipped,
      ...(state.failure ? { failureCause: state.failure } : {}),
    };

    if (result.failureCause) {
      this.emit(RUN_EVENT_TYPES.RUN_FAILED, { runId, cause: result.failureCause });
      logger.error('Run failed', { ...result.failureCause });
    } else {
      this.emit(RUN_EVENT_TYPES.RUN_COMPLETED, { runId, questionsAnswered: result.questionsAnswered, pagesVisited: result.pagesVisited });
      logger.info('Run completed', { questionsAnswered: result.questionsAnswered, pagesVisited: result.pagesVisited });
    }
    return result;
  }

  /**
   * Submit the quiz at most once per run. Returns false without touching the
   * page when the latest run is already submitted or a submit is in flight.
   */
  async submitOnce(): Promise<boolean> {
    const machine = this.machine;
    if (!machine) throw new QuizPilotError('No run has been started', 'no_run');
    if (machine.state === 'Submitted' || this.submitting) return false;
    if (machine.state !== 'AllComplete') throw new IllegalTransitionError('submitOnce', machine.state);

    this.submitting = true;
    try {
      await this.operator.submit(this.signal);
    } finally {
      this.submitting = false;
    }

    if (!machine.markSubmitted()) return false;
    this.emit(RUN_EVENT_TYPES.SUBMITTED, { questionsAnswered: machine.snapshot().questionsAnswered });
    return true;
  }

  // -- Loop --

  private async loop(machine: SessionStateMachine, directive: RunDirective, skipped: SkippedQuestion[], logger: Logger): Promise<void> {
    // Questions answered or skipped on the current page
    let handled: HandledQuestion[] = [];

    while (!machine.isTerminal()) {
      if (!machine.beginIteration()) return;
      throwIfAborted(this.signal);

      switch (machine.state) {
        case 'AwaitingQuestion':
        case 'Applied': {
          const question = await this.operator.identifyNextQuestion(handled, this.signal);

          if (!question) {
            machine.pageComplete();
            await this.finishPage(machine, logger);
            if (machine.state === 'AwaitingQuestion') handled = [];
            break;
          }

          handled.push(toHandledQuestion(question));
          const pageIndex = machine.snapshot().pageIndex;

          if (!directive.kinds.has(question.kind)) {
            skipped.push({ pageIndex, prompt: question.prompt, kind: question.kind });
            this.emit(RUN_EVENT_TYPES.QUESTION_SKIPPED, { questionId: question.id, kind: question.kind, pageIndex });
            logger.info('Question out of scope, skipped', { questionId: question.id, kind: question.kind });
            break;
          }

          if (machine.state === 'Applied') machine.moreQuestions();
          machine.questionIdentified(question);
          this.emit(RUN_EVENT_TYPES.QUESTION_IDENTIFIED, { questionId: question.id, kind: question.kind, pageIndex });

          const answer = await this.solver.solve(question, this.signal);
          await this.operator.applyAnswer(question, answer, this.signal);
          machine.answerApplied();
          this.emit(RUN_EVENT_TYPES.ANSWER_APPLIED, {
            questionId: question.id,
            answer: describeAnswerValue(answer.value),
            questionsAnswered: machine.snapshot().questionsAnswered,
          });
          break;
        }
        case 'PageComplete':
        case 'Paginating':
        case 'AllComplete':
          await this.finishPage(machine, logger);
          if (machine.state === 'AwaitingQuestion') handled = [];
          break;
        default:
          return;
      }
    }
  }

  /**
   * Carry a completed page forward one step: query the page for a next
   * control, then paginate or submit.
   */
  private async finishPage(machine: SessionStateMachine, logger: Logger): Promise<void> {
    if (machine.state === 'PageComplete') {
      const hasNext = await this.operator.hasNextPage(this.signal);
      machine.evaluatePagination(hasNext);
    }

    if (machine.state === 'Paginating') {
      await this.operator.goToNextPage(this.signal);
      machine.pageAdvanced();
      const pageIndex = machine.snapshot().pageIndex;
      this.emit(RUN_EVENT_TYPES.PAGE_ADVANCED, { pageIndex });
      logger.info('Page advanced', { pageIndex });
      return;
    }

    if (machine.state === 'AllComplete') {
      await this.submitOnce();
    }
  }

  private emit(type: RunEvent['type'], data: Record<string, unknown>): void {
    const event: RunEvent = { type, at: Date.now(), data };
    this.emitter.emit('event', event);
  }
}
