import type { ActionPayload, PageAutomation, PageSnapshot } from '../automation/types.js';
import {
  AffordanceNotFoundError,
  errorMessage,
  PerceptionError,
  TransportError,
  type AffordanceKind,
} from '../errors.js';
import { throwIfAborted, withTimeout, withTransportRetry } from '../llm/retry.js';
import type { ModelIdentity } from '../llm/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { describeAnswerValue, type Answer, type Question } from '../solver/types.js';
import { handledKey, toHandledQuestion, type Agent, type HandledQuestion, type QuestionLocator, type QuestionScope } from './types.js';

export interface PageOperatorOptions {
  /** Timeout for one page action */
  actionTimeoutMs: number;
  /** Timeout for one perception round-trip to the operator model */
  perceptionTimeoutMs: number;
  /** Attempts per action or perception */
  maxActionAttempts: number;
  logger?: Logger;
}

// ── Boolean option matching ─────────────────────────────────────────────

const TRUE_LABELS = new Set(['true', 't', 'yes', 'correct', 'right', '√', '✓', '正确', '对', '是']);
const FALSE_LABELS = new Set(['false', 'f', 'no', 'incorrect', 'wrong', '×', '✗', '错误', '错', '不正确', '不对', '否']);

/** Index of the option whose label reads as `value`, or -1. */
export function findBooleanOption(options: readonly string[], value: boolean): number {
  const labels = value ? TRUE_LABELS : FALSE_LABELS;
  return options.findIndex((option) => {
    const normalized = option
      .trim()
      .toLowerCase()
      .replace(/^[a-z][.)、:：]\s*/, '')
      .replace(/[.。!！]$/, '');
    return labels.has(normalized);
  });
}

// ── Agent ───────────────────────────────────────────────────────────────

/**
 * The page-operating side of the pair. Perceives the page through a
 * PageAutomation, locates questions through a QuestionLocator and applies
 * answers through the question's bindings. Never decides an answer.
 */
export class PageOperatorAgent implements Agent {
  readonly role = 'operator' as const;
  private readonly logger: Logger;
  private directive: string | undefined;
  private nextQuestionId = 1;
  private started = false;

  constructor(
    private readonly automation: PageAutomation,
    private readonly locator: QuestionLocator,
    private readonly options: PageOperatorOptions,
  ) {
    this.logger = (options.logger ?? getLogger()).child({ role: 'operator' });
  }

  get model(): ModelIdentity {
    return this.locator.identity;
  }

  // -- Lifecycle --

  async start(directive?: string, signal?: AbortSignal): Promise<void> {
    this.directive = directive;
    await this.pageCall('connect', () => this.automation.connect(), signal);
    this.started = true;
    this.logger.info('Operator started', { automation: this.automation.type, directive });
  }

  /** Detach from the page. Safe to call more than once or before start(). */
  async stop(): Promise<void> {
    if (!this.started && !this.automation.isConnected()) return;
    this.started = false;
    await this.automation.disconnect();
    this.logger.info('Operator stopped');
  }

  // -- Questions --

  /**
   * Next unanswered question on the current page, or null when none is left.
   * An unusable reply, a re-reported handled question or a transient model
   * failure costs one of `maxActionAttempts` perceptions.
   */
  async identifyNextQuestion(exclude: readonly HandledQuestion[], signal?: AbortSignal): Promise<Question | null> {
    const scope: QuestionScope = { exclude, ...(this.directive ? { directive: this.directive } : {}) };
    const handled = new Set(exclude.map(handledKey));
    let lastError: PerceptionError | TransportError | undefined;

    for (let attempt = 1; attempt <= this.options.maxActionAttempts; attempt++) {
      throwIfAborted(signal);
      const snapshot = await this.perceive(signal);

      try {
        const located = await withTimeout((s) => this.locator.locate(snapshot, scope, s), this.options.perceptionTimeoutMs, {
          source: 'model',
          label: 'operator perception',
          signal,
        });
        if (!located) return null;
        if (handled.has(handledKey(toHandledQuestion(located)))) {
          throw new PerceptionError(`Operator reported an already handled question: "${located.prompt}"`);
        }

        const question: Question = { id: `q${this.nextQuestionId++}`, ...located };
        this.logger.debug('Question located', { questionId: question.id, kind: question.kind, prompt: question.prompt });
        return question;
      } catch (err) {
        if (!(err instanceof PerceptionError) && !(err instanceof TransportError && err.transient)) throw err;
        lastError = err;
        this.logger.warn('Perception failed', { attempt, maxAttempts: this.options.maxActionAttempts, error: err.message });
      }
    }

    throw lastError ?? new PerceptionError('Perception failed');
  }

  /** Apply `answer` to the page through the question's bindings. */
  async applyAnswer(question: Question, answer: Answer, signal?: AbortSignal): Promise<void> {
    const value = answer.value;
    const attempted = describeAnswerValue(value);
    const optionIds = question.bindings.optionAffordances ?? [];

    const optionAt = (index: number): string => {
      const id = optionIds[index];
      if (!id) {
        throw new AffordanceNotFoundError('option', `no element bound to option ${index}`, question, attempted);
      }
      return id;
    };

    switch (value.type) {
      case 'option':
        await this.perform('option', optionAt(value.index), { type: 'click' }, { question, attempted, signal });
        break;
      case 'options':
        for (const index of value.indices) {
          await this.perform('option', optionAt(index), { type: 'click' }, { question, attempted, signal });
        }
        break;
      case 'boolean': {
        const index = question.options ? findBooleanOption(question.options, value.value) : -1;
        if (index >= 0) {
          await this.perform('option', optionAt(index), { type: 'click' }, { question, attempted, signal });
        } else if (question.bindings.inputAffordance) {
          await this.perform('input', question.bindings.inputAffordance, { type: 'fill', text: attempted }, { question, attempted, signal });
        } else {
          throw new AffordanceNotFoundError('option', `no choice reads as ${attempted}`, question, attempted);
        }
        break;
      }
      case 'text': {
        const input = question.bindings.inputAffordance;
        if (!input) {
          throw new AffordanceNotFoundError('input', 'question has no text input', question, attempted);
        }
        await this.perform('input', input, { type: 'fill', text: value.text }, { question, attempted, signal });
        break;
      }
    }

    this.logger.info('Answer applied', { questionId: question.id, answer: attempted });
  }

  // -- Pages --

  /** Asked fresh every time; never cached across pages. */
  hasNextPage(signal?: AbortSignal): Promise<boolean> {
    return this.pageCall('hasNext', () => this.automation.hasNext(), signal);
  }

  async goToNextPage(signal?: AbortSignal): Promise<void> {
    const snapshot = await this.perceive(signal);
    const next = snapshot.affordances.find((a) => a.role === 'next');
    if (!next) {
      throw new AffordanceNotFoundError('next', 'page shows no next-page control');
    }
    await this.perform('next', next.id, { type: 'click' }, { signal });
    this.logger.info('Advanced to next page');
  }

  /**
   * Activate the submit control once. Not retried: a repeated submit could
   * hand in the quiz twice.
   */
  async submit(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const result = await withTimeout(() => this.automation.submit(), this.options.actionTimeoutMs, {
      source: 'page',
      label: 'submit',
      signal,
    });
    if (!result.success) {
      throw new AffordanceNotFoundError('submit', result.message);
    }
    this.logger.info('Submitted');
  }

  // -- Internals --

  private perceive(signal?: AbortSignal): Promise<PageSnapshot> {
    return this.pageCall('perceive', () => this.automation.perceive(), signal);
  }

  /** Idempotent page call with timeout and transient-failure retry. */
  private pageCall<T>(label: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withTransportRetry(
      () => task(),
      {
        retries: this.options.maxActionAttempts - 1,
        timeoutMs: this.options.actionTimeoutMs,
        source: 'page',
        label,
      },
      { signal, logger: this.logger },
    );
  }

  /**
   * Run one action, retrying both transient transport failures and actions
   * the page reports as unsuccessful. Gives up with AffordanceNotFoundError.
   */
  private async perform(
    kind: AffordanceKind,
    affordanceId: string,
    payload: ActionPayload,
    context: { question?: Question; attempted?: string; signal?: AbortSignal },
  ): Promise<void> {
    let lastMessage = '';

    for (let attempt = 1; attempt <= this.options.maxActionAttempts; attempt++) {
      throwIfAborted(context.signal);
      try {
        const result = await withTimeout(() => this.automation.act(affordanceId, payload), this.options.actionTimeoutMs, {
          source: 'page',
          label: `act ${affordanceId}`,
          signal: context.signal,
        });
        if (result.success) return;
        lastMessage = result.message;
      } catch (err) {
        if (!(err instanceof TransportError) || !err.transient) throw err;
        lastMessage = errorMessage(err);
      }
      this.logger.warn('Action failed', { affordanceId, attempt, maxAttempts: this.options.maxActionAttempts, error: lastMessage });
    }

    throw new AffordanceNotFoundError(kind, `${affordanceId}: ${lastMessage}`, context.question, context.attempted);
  }
}
