import { EventEmitter } from 'eventemitter3';
import { BudgetExceededError, QuizPilotError } from '../errors.js';
import { describeFailure, type FailureCause } from './failure.js';
import type { Question } from '../solver/types.js';
import { TERMINAL_STATES, type SessionState, type SessionStateName, type TransitionEvent } from './types.js';

/** A transition the machine does not define. Always a programming error. */
export class IllegalTransitionError extends QuizPilotError {
  constructor(
    public readonly operation: string,
    public readonly from: SessionStateName,
  ) {
    super(`Illegal transition: ${operation} from ${from}`, 'illegal_transition');
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Owns the SessionState of one run. Every mutation goes through a named
 * operation; anything the transition table does not allow throws.
 */
export class SessionStateMachine {
  private emitter = new EventEmitter();
  private current: SessionState;

  constructor(maxIterations: number) {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    this.current = {
      state: 'AwaitingQuestion',
      pageIndex: 0,
      answeredOnPage: 0,
      questionsAnswered: 0,
      hasNextPage: null,
      submitted: false,
      iterationsUsed: 0,
      maxIterations,
    };
  }

  // -- Reading --

  get state(): SessionStateName {
    return this.current.state;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current.state);
  }

  snapshot(): Readonly<SessionState> {
    return { ...this.current };
  }

  onTransition(listener: (event: TransitionEvent) => void): void {
    this.emitter.on('transition', listener);
  }

  // -- Budget --

  /**
   * Consume one iteration. When the budget is already spent, fails the run
   * with BudgetExceeded and returns false.
   */
  beginIteration(): boolean {
    this.assertNotTerminal('beginIteration');
    const { iterationsUsed, maxIterations, questionsAnswered } = this.current;
    if (iterationsUsed >= maxIterations) {
      this.fail(describeFailure(new BudgetExceededError(iterationsUsed, maxIterations, questionsAnswered), questionsAnswered));
      return false;
    }
    this.current.iterationsUsed++;
    return true;
  }

  // -- Questions --

  questionIdentified(question: Question): void {
    this.transition('questionIdentified', ['AwaitingQuestion'], 'Answering', () => {
      this.current.currentQuestionId = question.id;
    });
  }

  answerApplied(): void {
    this.transition('answerApplied', ['Answering'], 'Applied', () => {
      this.current.answeredOnPage++;
      this.current.questionsAnswered++;
      delete this.current.currentQuestionId;
    });
  }

  moreQuestions(): void {
    this.transition('moreQuestions', ['Applied'], 'AwaitingQuestion');
  }

  /** The page holds no further in-scope question. */
  pageComplete(): void {
    this.transition('pageComplete', ['Applied', 'AwaitingQuestion'], 'PageComplete');
  }

  // -- Pages --

  /** `hasNext` must come from a fresh query of the current page. */
  evaluatePagination(hasNext: boolean): void {
    if (hasNext) {
      this.transition('evaluatePagination', ['PageComplete'], 'Paginating', () => {
        this.current.hasNextPage = true;
        this.current.pageIndex++;
        this.current.answeredOnPage = 0;
      });
    } else {
      this.transition('evaluatePagination', ['PageComplete'], 'AllComplete', () => {
        this.current.hasNextPage = false;
      });
    }
  }

  pageAdvanced(): void {
    this.transition('pageAdvanced', ['Paginating'], 'AwaitingQuestion', () => {
      this.current.hasNextPage = null;
    });
  }

  // -- Termination --

  /** Returns false (and changes nothing) when already submitted. */
  markSubmitted(): boolean {
    if (this.current.state === 'Submitted') return false;
    this.transition('markSubmitted', ['AllComplete'], 'Submitted', () => {
      this.current.submitted = true;
    });
    return true;
  }

  /** Move to Failed. A no-op once the run is terminal. */
  fail(cause: FailureCause): void {
    if (this.isTerminal()) return;
    const from = this.current.state;
    this.current.state = 'Failed';
    this.current.failure = cause;
    delete this.current.currentQuestionId;
    this.emitTransition('fail', from, 'Failed');
  }

  // -- Internals --

  private transition(
    operation: string,
    allowed: readonly SessionStateName[],
    to: SessionStateName,
    mutate?: () => void,
  ): void {
    const from = this.current.state;
    if (!allowed.includes(from)) {
      throw new IllegalTransitionError(operation, from);
    }
    mutate?.();
    this.current.state = to;
    this.emitTransition(operation, from, to);
  }

  private assertNotTerminal(operation: string): void {
    if (this.isTerminal()) throw new IllegalTransitionError(operation, this.current.state);
  }

  private emitTransition(operation: string, from: SessionStateName, to: SessionStateName): void {
    const event: TransitionEvent = { from, to, operation, snapshot: this.snapshot() };
    this.emitter.emit('transition', event);
  }
}
