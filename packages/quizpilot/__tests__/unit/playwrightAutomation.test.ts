import { beforeEach, describe, expect, test, vi } from 'vitest';
import { PlaywrightPageAutomation } from '../../src/automation/playwright.js';
import { TransportError } from '../../src/errors.js';

interface CollectedPage {
  url: string;
  title: string;
  text: string;
  affordances: Array<{ id: string; role: string; label: string }>;
}

// In-process stand-ins for the Browser and Page objects connectOverCDP hands back.
const pw = vi.hoisted(() => {
  class TimeoutError extends Error {
    constructor(message: string) {
      super(message);
      this.name = 'TimeoutError';
    }
  }

  class FakeLocator {
    constructor(
      private readonly page: FakePage,
      private readonly id: string,
    ) {}

    async count(): Promise<number> {
      return this.page.snapshot.affordances.some((a) => a.id === this.id) ? 1 : 0;
    }

    first(): FakeLocator {
      return this;
    }

    async click(): Promise<void> {
      if (this.page.actionFailure) throw this.page.actionFailure;
      this.page.performed.push(`click ${this.id}`);
    }

    async fill(text: string): Promise<void> {
      this.page.performed.push(`fill ${this.id} ${text}`);
    }

    async selectOption(option: { label: string }): Promise<void> {
      this.page.performed.push(`select ${this.id} ${option.label}`);
    }

    async evaluate(): Promise<string> {
      return this.page.tagNames[this.id] ?? 'INPUT';
    }
  }

  class FakePage {
    snapshot: CollectedPage;
    performed: string[] = [];
    tagNames: Record<string, string> = {};
    actionFailure: Error | undefined;
    closeCalls = 0;

    constructor(private readonly address: string) {
      this.snapshot = { url: address, title: 'Quiz', text: '', affordances: [] };
    }

    url(): string {
      return this.address;
    }

    mainFrame(): FakePage {
      return this;
    }

    on(): void {}

    async evaluate(): Promise<unknown> {
      return this.snapshot;
    }

    locator(selector: string): FakeLocator {
      return new FakeLocator(this, /data-qp-id="([^"]+)"/.exec(selector)?.[1] ?? '');
    }

    async close(): Promise<void> {
      this.closeCalls++;
    }
  }

  class FakeBrowser {
    closeCalls = 0;
    private connected = true;

    constructor(readonly pages: FakePage[]) {}

    contexts(): Array<{ pages: () => FakePage[] }> {
      return [{ pages: () => this.pages }];
    }

    isConnected(): boolean {
      return this.connected;
    }

    async close(): Promise<void> {
      this.closeCalls++;
      this.connected = false;
    }
  }

  const state: { browser: FakeBrowser | undefined } = { browser: undefined };
  const connectOverCDP = vi.fn(async (_endpoint: string) => {
    if (!state.browser) throw new Error('connect ECONNREFUSED 127.0.0.1:9222');
    return state.browser;
  });

  return { TimeoutError, FakePage, FakeBrowser, state, connectOverCDP };
});

vi.mock('playwright', () => ({
  chromium: { connectOverCDP: pw.connectOverCDP },
  errors: { TimeoutError: pw.TimeoutError },
}));

const QUIZ_URL = 'https://quiz.example.test/exam';

function quizPage() {
  const page = new pw.FakePage(QUIZ_URL);
  page.snapshot = {
    url: QUIZ_URL,
    title: 'Quiz',
    text: '1. Pick one\nAlpha\nBeta',
    affordances: [
      { id: 'qp-0', role: 'option', label: 'Alpha' },
      { id: 'qp-1', role: 'input', label: 'Country' },
      { id: 'qp-2', role: 'submit', label: 'Submit' },
    ],
  };
  return page;
}

async function connected(page = quizPage(), config: { maxTextLength?: number } = {}) {
  const browser = new pw.FakeBrowser([new pw.FakePage('about:blank'), page]);
  pw.state.browser = browser;
  const automation = new PlaywrightPageAutomation({ cdpUrl: 'http://localhost:9222', actionTimeoutMs: 50, ...config });
  await automation.connect();
  return { automation, browser, page };
}

beforeEach(() => {
  pw.state.browser = undefined;
  pw.connectOverCDP.mockClear();
});

describe('PlaywrightPageAutomation', () => {
  test('attaches over CDP to the latest tab that is not blank', async () => {
    const quiz = quizPage();
    const browser = new pw.FakeBrowser([quiz, new pw.FakePage('about:blank')]);
    pw.state.browser = browser;
    const automation = new PlaywrightPageAutomation({ cdpUrl: 'http://localhost:9222' });

    await automation.connect();

    expect(pw.connectOverCDP).toHaveBeenCalledWith('http://localhost:9222');
    expect((await automation.perceive()).url).toBe(QUIZ_URL);
  });

  test('reports an unreachable browser as a non-transient page error', async () => {
    const automation = new PlaywrightPageAutomation({ cdpUrl: 'http://localhost:9222' });
    const err = await automation.connect().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ source: 'page', transient: false });
    expect(err instanceof Error && err.message.startsWith('Could not connect to Chrome over CDP: connect ECONNREFUSED')).toBe(true);
  });

  test('cuts page text to the configured length', async () => {
    const { automation } = await connected(quizPage(), { maxTextLength: 11 });
    const snapshot = await automation.perceive();

    expect(snapshot.text).toBe('1. Pick one');
    expect(snapshot.affordances.map((a) => a.id)).toEqual(['qp-0', 'qp-1', 'qp-2']);
  });

  test('rejects a collected snapshot with an unknown role', async () => {
    const page = quizPage();
    page.snapshot.affordances.push({ id: 'qp-9', role: 'slider', label: 'Volume' });
    const { automation } = await connected(page);

    await expect(automation.perceive()).rejects.toBeInstanceOf(TransportError);
  });

  test('sees a next page only when the page shows a next control', async () => {
    const { automation, page } = await connected();
    expect(await automation.hasNext()).toBe(false);

    page.snapshot.affordances.push({ id: 'qp-3', role: 'next', label: 'Next page' });
    expect(await automation.hasNext()).toBe(true);
  });

  test('submit clicks the submit control', async () => {
    const { automation, page } = await connected();
    const result = await automation.submit();

    expect(result.success).toBe(true);
    expect(page.performed).toEqual(['click qp-2']);
  });

  test('submit reports failure when the page has no submit control', async () => {
    const page = quizPage();
    page.snapshot.affordances = page.snapshot.affordances.filter((a) => a.role !== 'submit');
    const { automation } = await connected(page);

    const result = await automation.submit();
    expect(result).toEqual({ success: false, message: 'No submit control on this page', durationMs: 0 });
    expect(page.performed).toEqual([]);
  });

  test('fills inputs and picks select options by label', async () => {
    const page = quizPage();
    page.snapshot.affordances.push({ id: 'qp-4', role: 'input', label: 'Continent' });
    page.tagNames['qp-4'] = 'SELECT';
    const { automation } = await connected(page);

    await automation.act('qp-1', { type: 'fill', text: 'France' });
    await automation.act('qp-4', { type: 'fill', text: 'Europe' });
    expect(page.performed).toEqual(['fill qp-1 France', 'select qp-4 Europe']);
  });

  test('reports an element that is gone as an unsuccessful action', async () => {
    const { automation } = await connected();
    const result = await automation.act('qp-7', { type: 'click' });

    expect(result.success).toBe(false);
    expect(result.message).toBe('No element tagged qp-7');
  });

  test('maps an action timeout to a transient page error', async () => {
    const { automation, page } = await connected();
    page.actionFailure = new pw.TimeoutError('locator.click: Timeout 50ms exceeded.');

    const err = await automation.act('qp-0', { type: 'click' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ source: 'page', transient: true, message: 'act qp-0: locator.click: Timeout 50ms exceeded.' });
  });

  test('reports other action errors as unsuccessful without throwing', async () => {
    const { automation, page } = await connected();
    page.actionFailure = new Error('Element is not visible');

    const result = await automation.act('qp-0', { type: 'click' });
    expect(result).toMatchObject({ success: false, message: 'Element is not visible' });
  });

  test('disconnect drops the CDP connection once and leaves the tabs open', async () => {
    const { automation, browser, page } = await connected();

    await automation.disconnect();
    await automation.disconnect();

    expect(browser.closeCalls).toBe(1);
    expect(browser.pages.map((p) => p.closeCalls)).toEqual([0, 0]);
    expect(page.closeCalls).toBe(0);
    expect(automation.isConnected()).toBe(false);
    await expect(automation.act('qp-0', { type: 'click' })).rejects.toThrow('Browser is not connected');
  });
});
