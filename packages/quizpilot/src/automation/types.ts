/**
 * Abstraction over the browser the quiz lives in.
 *
 * The operator agent reaches the page only through this interface; it never
 * reads pixels or DOM itself. Only implementations may import playwright.
 */
export interface PageAutomation {
  /** Implementation identifier */
  readonly type: AutomationType;

  // -- Lifecycle --

  /** Attach to the browser session */
  connect(): Promise<void>;

  /**
   * Detach the control channel. Must never close the user's browser process
   * or its pages.
   */
  disconnect(): Promise<void>;

  isConnected(): boolean;

  // -- Capabilities --

  /** Current page text plus the interactive affordances on it */
  perceive(): Promise<PageSnapshot>;

  /** Interact with one affordance from the latest snapshot */
  act(affordanceId: string, payload: ActionPayload): Promise<ActionResult>;

  /** Whether the current page shows a control leading to a further page of questions */
  hasNext(): Promise<boolean>;

  /** Activate the page's submit control */
  submit(): Promise<ActionResult>;
}

// -- Types --

export type AutomationType = 'playwright' | 'scripted';

export type AffordanceRole = 'option' | 'input' | 'next' | 'submit' | 'button';

export interface Affordance {
  /** Stays the same while the element is on the page */
  id: string;
  role: AffordanceRole;
  /** Visible label or option text */
  label: string;
  /** Radio/checkbox group name, when the page exposes one */
  group?: string;
  checked?: boolean;
  /** Current value of text inputs */
  value?: string;
  inputType?: string;
}

export interface PageSnapshot {
  url: string;
  title: string;
  /** Visible text of the page, trimmed to a size the operator model can take */
  text: string;
  affordances: Affordance[];
  capturedAt: number;
}

export type ActionPayload = { type: 'click' } | { type: 'fill'; text: string };

export interface ActionResult {
  /** Whether the action succeeded */
  success: boolean;
  /** Human-readable description of what happened */
  message: string;
  /** Duration in milliseconds */
  durationMs: number;
}
