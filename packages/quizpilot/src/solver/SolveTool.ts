import { EventEmitter } from 'eventemitter3';
import type { ReasoningAgent } from '../agents/ReasoningAgent.js';
import { ParseError, SolveError, TransportError } from '../errors.js';
import { SOLVE_EVENT_TYPES, type RunEvent, type RunEventListener } from '../events/RunEventTypes.js';
import { withTransportRetry } from '../llm/retry.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { parseAnswer } from './answerParser.js';
import { describeAnswerValue, toReasoningRequest, type Answer, type Question } from './types.js';

export interface SolveToolOptions {
  /** Extra attempts on transient transport failures, per request */
  transportRetries: number;
  /** Timeout for one reasoner request */
  timeoutMs: number;
  /** Linear back-off step between transport retries */
  backoffMs?: number;
  logger?: Logger;
}

/**
 * Turns one Question into one Answer through the reasoning agent.
 *
 * Sends only the ReasoningRequest view of the question. A response that
 * does not parse gets exactly one corrective follow-up; a second failure,
 * or a transport failure that outlasts its retries, becomes a SolveError.
 * Has no page side effects.
 */
export class SolveTool {
  private emitter = new EventEmitter();
  private readonly logger: Logger;

  constructor(
    private readonly reasoner: ReasoningAgent,
    private readonly options: SolveToolOptions,
  ) {
    this.logger = (options.logger ?? getLogger()).child({ role: 'reasoner' });
  }

  on(listener: RunEventListener): void {
    this.emitter.on('event', listener);
  }

  off(listener: RunEventListener): void {
    this.emitter.off('event', listener);
  }

  async solve(question: Question, signal?: AbortSignal): Promise<Answer> {
    const request = toReasoningRequest(question);
    this.emit(SOLVE_EVENT_TYPES.SOLVE_STARTED, { questionId: question.id, kind: question.kind });
    this.logger.info('Solving question', { questionId: question.id, kind: question.kind });

    const first = await this.request(question, (s) => this.reasoner.reason(request, s), signal);
    const firstAttempt = this.parse(first, question);
    if (!(firstAttempt instanceof ParseError)) return this.complete(question, firstAttempt, false);

    const failure = firstAttempt;
    this.emit(SOLVE_EVENT_TYPES.SOLVE_CORRECTIVE, { questionId: question.id, reason: failure.reason, detail: failure.detail });
    this.logger.warn('Answer unreadable, asking for a reformatted response', {
      questionId: question.id,
      reason: failure.reason,
      detail: failure.detail,
    });

    const second = await this.request(question, (s) => this.reasoner.reformat(request, first, failure, s), signal, first);
    const secondAttempt = this.parse(second, question);
    if (secondAttempt instanceof ParseError) throw new SolveError(question, secondAttempt, second);
    return this.complete(question, secondAttempt, true);
  }

  // -- Internals --

  private async request(
    question: Question,
    call: (signal: AbortSignal) => Promise<string>,
    signal: AbortSignal | undefined,
    previousResponse?: string,
  ): Promise<string> {
    try {
      return await withTransportRetry(
        call,
        {
          retries: this.options.transportRetries,
          timeoutMs: this.options.timeoutMs,
          backoffMs: this.options.backoffMs,
          source: 'model',
          label: `reasoner ${this.reasoner.model.provider}/${this.reasoner.model.model}`,
        },
        {
          signal,
          logger: this.logger,
          onRetry: (attempt, err) =>
            this.emit(SOLVE_EVENT_TYPES.SOLVE_RETRY, { questionId: question.id, attempt, error: err.message }),
        },
      );
    } catch (err) {
      if (err instanceof TransportError) throw new SolveError(question, err, previousResponse);
      throw err;
    }
  }

  private parse(raw: string, question: Question): Answer | ParseError {
    try {
      return parseAnswer(raw, question);
    } catch (err) {
      if (err instanceof ParseError) return err;
      throw err;
    }
  }

  private complete(question: Question, answer: Answer, corrected: boolean): Answer {
    const summary = describeAnswerValue(answer.value);
    this.emit(SOLVE_EVENT_TYPES.SOLVE_COMPLETED, { questionId: question.id, answer: summary, corrected });
    this.logger.info('Question solved', { questionId: question.id, answer: summary, corrected });
    return answer;
  }

  private emit(type: RunEvent['type'], data: Record<string, unknown>): void {
    const event: RunEvent = { type, at: Date.now(), data };
    this.emitter.emit('event', event);
  }
}
