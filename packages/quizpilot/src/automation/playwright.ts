import { chromium, errors, type Browser, type Page } from 'playwright';
import { z } from 'zod';
import { errorMessage, TransportError } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type {
  ActionPayload,
  ActionResult,
  PageAutomation,
  PageSnapshot,
} from './types.js';

export interface PlaywrightAutomationConfig {
  /** DevTools endpoint of the running Chrome, e.g. http://localhost:9222 */
  cdpUrl: string;
  /** Per-action Playwright timeout */
  actionTimeoutMs?: number;
  /** Page text beyond this is cut before it reaches the operator model */
  maxTextLength?: number;
  logger?: Logger;
}

// ── Page-side collection script ─────────────────────────────────────────

const NEXT_PATTERN = /\b(next|continue)\b|下一页|下一题/i;
const SUBMIT_PATTERN = /\b(submit|finish|hand in)\b|提交|交卷/i;

// Runs inside the page. Tags every visible interactive element with
// data-qp-id and reports it with a role and label.
const COLLECT_SCRIPT = `(() => {
  var state = window.__qp || (window.__qp = { nextId: 0 });
  var NEXT = new RegExp(${JSON.stringify(NEXT_PATTERN.source)}, 'i');
  var SUBMIT = new RegExp(${JSON.stringify(SUBMIT_PATTERN.source)}, 'i');

  function isVisible(el) {
    var n = el;
    while (n && n !== document.body) {
      var s = window.getComputedStyle(n);
      if (s.display === 'none' || s.visibility === 'hidden') return false;
      if (n.getAttribute && n.getAttribute('aria-hidden') === 'true') return false;
      n = n.parentElement;
    }
    return true;
  }

  function tag(el) {
    if (!el.hasAttribute('data-qp-id')) el.setAttribute('data-qp-id', 'qp-' + (state.nextId++));
    return el.getAttribute('data-qp-id');
  }

  function labelOf(el) {
    var al = el.getAttribute('aria-label');
    if (al) return al.trim();
    if (el.id) {
      var lbl = document.querySelector('label[for="' + el.id + '"]');
      if (lbl && lbl.textContent.trim()) return lbl.textContent.trim();
    }
    var wrap = el.closest('label');
    if (wrap && wrap.textContent.trim()) return wrap.textContent.trim();
    if (el.tagName === 'INPUT' && (el.type === 'submit' || el.type === 'button')) return el.value || '';
    var text = (el.innerText || el.textContent || '').trim();
    return text || el.placeholder || el.getAttribute('title') || '';
  }

  var out = [];
  var seen = new Set();
  var SELECTOR = 'input, textarea, select, button, a[href], [role=radio], [role=checkbox], [role=button], [role=textbox], [contenteditable=true]';
  document.querySelectorAll(SELECTOR).forEach(function(el) {
    if (seen.has(el) || !isVisible(el) || el.disabled) return;
    seen.add(el);
    var type = (el.getAttribute('type') || '').toLowerCase();
    var role = el.getAttribute('role') || '';
    if (type === 'hidden') return;
    var label = labelOf(el).replace(/\\s+/g, ' ').slice(0, 300);
    var entry = { id: tag(el), label: label };

    if (type === 'radio' || type === 'checkbox' || role === 'radio' || role === 'checkbox') {
      entry.role = 'option';
      entry.inputType = type || role;
      entry.checked = el.checked === true || el.getAttribute('aria-checked') === 'true';
      var group = el.getAttribute('name') || (el.closest('[role=radiogroup], [role=group], fieldset') || {}).id;
      if (group) entry.group = group;
    } else if (el.tagName === 'TEXTAREA' || role === 'textbox' || el.isContentEditable ||
        (el.tagName === 'INPUT' && ['', 'text', 'number', 'search', 'email', 'url', 'tel'].indexOf(type) >= 0)) {
      entry.role = 'input';
      entry.inputType = el.tagName === 'TEXTAREA' ? 'textarea' : (type || 'text');
      entry.value = el.value !== undefined ? String(el.value) : (el.textContent || '');
    } else if (el.tagName === 'SELECT') {
      entry.role = 'input';
      entry.inputType = 'select';
      entry.value = String(el.value);
    } else if (SUBMIT.test(label)) {
      entry.role = 'submit';
    } else if (NEXT.test(label)) {
      entry.role = 'next';
    } else if (type === 'submit') {
      entry.role = 'submit';
    } else {
      entry.role = 'button';
    }
    out.push(entry);
  });

  return {
    url: location.href,
    title: document.title,
    text: document.body ? document.body.innerText : '',
    affordances: out,
  };
})()`;

const collectedSchema = z.object({
  url: z.string(),
  title: z.string(),
  text: z.string(),
  affordances: z.array(
    z.object({
      id: z.string(),
      role: z.enum(['option', 'input', 'next', 'submit', 'button']),
      label: z.string(),
      group: z.string().optional(),
      checked: z.boolean().optional(),
      value: z.string().optional(),
      inputType: z.string().optional(),
    }),
  ),
});

// ── Automation ──────────────────────────────────────────────────────────

/**
 * Drives the user's own Chrome over the DevTools protocol.
 *
 * connect() attaches to the running browser and picks the most recent
 * non-blank tab. disconnect() drops the CDP connection; the browser and its
 * tabs stay open.
 */
export class PlaywrightPageAutomation implements PageAutomation {
  readonly type = 'playwright' as const;
  private browser: Browser | null = null;
  private page: Page | null = null;
  private readonly actionTimeoutMs: number;
  private readonly maxTextLength: number;
  private readonly logger: Logger;

  constructor(private readonly config: PlaywrightAutomationConfig) {
    this.actionTimeoutMs = config.actionTimeoutMs ?? 30_000;
    this.maxTextLength = config.maxTextLength ?? 12_000;
    this.logger = (config.logger ?? getLogger()).child({ component: 'playwright' });
  }

  // -- Lifecycle --

  async connect(): Promise<void> {
    if (this.browser?.isConnected()) return;

    try {
      this.browser = await chromium.connectOverCDP(this.config.cdpUrl);
    } catch (err) {
      throw new TransportError(
        `Could not connect to Chrome over CDP: ${errorMessage(err)}. Start Chrome with --remote-debugging-port.`,
        'page',
        false,
      );
    }

    const pages = this.browser.contexts().flatMap((context) => context.pages());
    const candidates = pages.filter((p) => p.url() !== 'about:blank');
    const page = candidates[candidates.length - 1] ?? pages[pages.length - 1];
    if (!page) {
      throw new TransportError('Connected browser has no open tab', 'page', false);
    }

    this.page = page;
    page.on('framenavigated', (frame) => {
      if (frame === page.mainFrame()) this.logger.debug('Page navigated', { url: frame.url() });
    });
    this.logger.info('Connected to browser', { url: page.url() });
  }

  async disconnect(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (!browser) return;
    // For a connectOverCDP browser, close() drops the connection and leaves
    // the browser process running.
    await browser.close();
    this.logger.info('Disconnected from browser');
  }

  isConnected(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  // -- Capabilities --

  async perceive(): Promise<PageSnapshot> {
    const page = this.requirePage();
    let raw: unknown;
    try {
      raw = await page.evaluate(COLLECT_SCRIPT);
    } catch (err) {
      throw this.toTransportError('perceive', err);
    }

    const parsed = collectedSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError(`Unexpected page snapshot shape: ${parsed.error.message}`, 'page', false);
    }

    return {
      ...parsed.data,
      text: parsed.data.text.slice(0, this.maxTextLength),
      capturedAt: Date.now(),
    };
  }

  async act(affordanceId: string, payload: ActionPayload): Promise<ActionResult> {
    const page = this.requirePage();
    const start = Date.now();
    const locator = page.locator(`[data-qp-id="${affordanceId}"]`);

    const done = (success: boolean, message: string): ActionResult => {
      this.logger.debug('Action done', { affordanceId, action: payload.type, success });
      return { success, message, durationMs: Date.now() - start };
    };

    try {
      if ((await locator.count()) === 0) {
        return done(false, `No element tagged ${affordanceId}`);
      }
      if (payload.type === 'click') {
        await locator.first().click({ timeout: this.actionTimeoutMs });
        return done(true, `Clicked ${affordanceId}`);
      }
      const tagName: unknown = await locator.first().evaluate('el => el.tagName');
      if (tagName === 'SELECT') {
        await locator.first().selectOption({ label: payload.text }, { timeout: this.actionTimeoutMs });
      } else {
        await locator.first().fill(payload.text, { timeout: this.actionTimeoutMs });
      }
      return done(true, `Filled ${affordanceId}`);
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw this.toTransportError(`act ${affordanceId}`, err);
      }
      return done(false, errorMessage(err));
    }
  }

  async hasNext(): Promise<boolean> {
    const snapshot = await this.perceive();
    return snapshot.affordances.some((a) => a.role === 'next');
  }

  async submit(): Promise<ActionResult> {
    const snapshot = await this.perceive();
    const control = snapshot.affordances.find((a) => a.role === 'submit');
    if (!control) {
      return { success: false, message: 'No submit control on this page', durationMs: 0 };
    }
    return this.act(control.id, { type: 'click' });
  }

  // -- Internals --

  private requirePage(): Page {
    if (!this.page || !this.browser?.isConnected()) {
      throw new TransportError('Browser is not connected', 'page', false);
    }
    return this.page;
  }

  private toTransportError(label: string, err: unknown): TransportError {
    return new TransportError(`${label}: ${errorMessage(err)}`, 'page', err instanceof errors.TimeoutError);
  }
}
