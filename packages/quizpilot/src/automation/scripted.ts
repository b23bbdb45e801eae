import { TransportError } from '../errors.js';
import type { QuestionKind } from '../solver/types.js';
import type {
  ActionPayload,
  ActionResult,
  Affordance,
  PageAutomation,
  PageSnapshot,
} from './types.js';

export interface ScriptedQuestion {
  prompt: string;
  kind: QuestionKind;
  options?: string[];
  multiSelect?: boolean;
  formatHint?: string;
}

export interface ScriptedPage {
  title?: string;
  questions: ScriptedQuestion[];
  /** Whether this page shows a "next page" control (default: false) */
  hasNext?: boolean;
}

export interface ScriptedAutomationConfig {
  pages: ScriptedPage[];
  /** Whether the last page offers a submit control (default: true) */
  submitAvailable?: boolean;
  /** Affordances whose actions report failure */
  failingAffordances?: string[];
  /** Number of act() calls that throw a transient transport error before succeeding */
  transientActFailures?: number;
  url?: string;
}

/** Current state of one scripted question, as the page would show it. */
export interface ScriptedQuestionState extends ScriptedQuestion {
  optionAffordances: string[];
  inputAffordance?: string;
  selected: number[];
  value: string;
  answered: boolean;
}

export interface RecordedAction {
  pageIndex: number;
  affordanceId: string;
  payload: ActionPayload;
}

/**
 * In-process page automation for tests and dry runs.
 * Does NOT touch a browser -- serves scripted pages with the same
 * affordance model as PlaywrightPageAutomation.
 */
export class ScriptedPageAutomation implements PageAutomation {
  readonly type = 'scripted' as const;
  private readonly config: Required<Omit<ScriptedAutomationConfig, 'url'>> & { url: string };
  private connected = false;
  private pageIndex = 0;
  private transientFailuresLeft: number;
  private states: ScriptedQuestionState[][];

  readonly actions: RecordedAction[] = [];
  submitCalls = 0;
  hasNextCalls = 0;
  disconnectCalls = 0;

  constructor(config: ScriptedAutomationConfig) {
    this.config = {
      pages: config.pages,
      submitAvailable: config.submitAvailable ?? true,
      failingAffordances: config.failingAffordances ?? [],
      transientActFailures: config.transientActFailures ?? 0,
      url: config.url ?? 'https://quiz.example.test/exam',
    };
    this.transientFailuresLeft = this.config.transientActFailures;
    this.states = this.config.pages.map((page, p) =>
      page.questions.map((question, q) => ({
        ...question,
        optionAffordances: (question.options ?? []).map((_, o) => `p${p}-q${q}-o${o}`),
        ...(question.options?.length ? {} : { inputAffordance: `p${p}-q${q}-input` }),
        selected: [],
        value: '',
        answered: false,
      })),
    );
  }

  // -- Lifecycle --

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // -- Inspection helpers --

  get currentPageIndex(): number {
    return this.pageIndex;
  }

  /** Question states on the current page */
  currentQuestions(): readonly ScriptedQuestionState[] {
    return this.states[this.pageIndex] ?? [];
  }

  questionState(pageIndex: number, questionIndex: number): ScriptedQuestionState | undefined {
    return this.states[pageIndex]?.[questionIndex];
  }

  // -- Capabilities --

  async perceive(): Promise<PageSnapshot> {
    this.assertConnected();
    const page = this.config.pages[this.pageIndex];
    const lines: string[] = [page?.title ?? `Page ${this.pageIndex + 1}`];
    const affordances: Affordance[] = [];

    this.currentQuestions().forEach((state, q) => {
      lines.push(`${q + 1}. ${state.prompt}`);
      (state.options ?? []).forEach((option, o) => {
        lines.push(`  ${option}`);
        affordances.push({
          id: state.optionAffordances[o],
          role: 'option',
          label: option,
          group: `p${this.pageIndex}-q${q}`,
          checked: state.selected.includes(o),
          inputType: state.multiSelect ? 'checkbox' : 'radio',
        });
      });
      if (state.inputAffordance) {
        affordances.push({ id: state.inputAffordance, role: 'input', label: state.prompt, value: state.value, inputType: 'text' });
      }
    });

    if (page?.hasNext) {
      affordances.push({ id: `p${this.pageIndex}-next`, role: 'next', label: 'Next page' });
    } else if (this.config.submitAvailable) {
      affordances.push({ id: `p${this.pageIndex}-submit`, role: 'submit', label: 'Submit' });
    }

    return {
      url: `${this.config.url}?page=${this.pageIndex + 1}`,
      title: page?.title ?? 'Quiz',
      text: lines.join('\n'),
      affordances,
      capturedAt: Date.now(),
    };
  }

  async act(affordanceId: string, payload: ActionPayload): Promise<ActionResult> {
    this.assertConnected();
    const start = Date.now();

    if (this.transientFailuresLeft > 0) {
      this.transientFailuresLeft--;
      throw new TransportError('Scripted transient page failure', 'page', true);
    }

    this.actions.push({ pageIndex: this.pageIndex, affordanceId, payload });
    const result = this.apply(affordanceId, payload);
    return { ...result, durationMs: Date.now() - start };
  }

  async hasNext(): Promise<boolean> {
    this.assertConnected();
    this.hasNextCalls++;
    return this.config.pages[this.pageIndex]?.hasNext ?? false;
  }

  async submit(): Promise<ActionResult> {
    this.assertConnected();
    this.submitCalls++;
    const onLastPage = !(this.config.pages[this.pageIndex]?.hasNext ?? false);
    if (!this.config.submitAvailable || !onLastPage) {
      return { success: false, message: 'No submit control on this page', durationMs: 0 };
    }
    return { success: true, message: 'Submitted', durationMs: 0 };
  }

  // -- Internals --

  private apply(affordanceId: string, payload: ActionPayload): Omit<ActionResult, 'durationMs'> {
    if (this.config.failingAffordances.includes(affordanceId)) {
      return { success: false, message: `Element ${affordanceId} is not interactable` };
    }

    if (affordanceId === `p${this.pageIndex}-next` && payload.type === 'click') {
      this.pageIndex++;
      return { success: true, message: 'Navigated to next page' };
    }

    for (const state of this.currentQuestions()) {
      const optionIndex = state.optionAffordances.indexOf(affordanceId);
      if (optionIndex >= 0 && payload.type === 'click') {
        if (state.multiSelect) {
          state.selected = state.selected.includes(optionIndex)
            ? state.selected.filter((i) => i !== optionIndex)
            : [...state.selected, optionIndex];
        } else {
          state.selected = [optionIndex];
        }
        state.answered = state.selected.length > 0;
        return { success: true, message: `Clicked ${affordanceId}` };
      }
      if (state.inputAffordance === affordanceId && payload.type === 'fill') {
        state.value = payload.text;
        state.answered = payload.text.length > 0;
        return { success: true, message: `Filled ${affordanceId}` };
      }
    }

    return { success: false, message: `No element matches ${affordanceId}` };
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new TransportError('Scripted automation is not connected', 'page', false);
    }
  }
}
