import { describe, expect, test } from 'vitest';
import { buildRun, eventTypes, mcq } from './helpers.js';

// ── Scenarios ────────────────────────────────────────────────────────────

describe('Quiz run: end to end', () => {
  test('single page of three questions is answered and submitted', async () => {
    const { automation, orchestrator, events } = buildRun(
      [{ questions: [mcq('Question one'), mcq('Question two'), mcq('Question three')] }],
      ['ANSWER: A', 'Reasoning.\nANSWER: B', 'ANSWER: C'],
    );

    const result = await orchestrator.run();

    expect(result).toMatchObject({
      finalState: 'Submitted',
      questionsAnswered: 3,
      pagesVisited: 1,
      iterationsUsed: 4,
      skippedQuestions: [],
    });
    expect(result.failureCause).toBeUndefined();
    expect(automation.questionState(0, 0)?.selected).toEqual([0]);
    expect(automation.questionState(0, 1)?.selected).toEqual([1]);
    expect(automation.questionState(0, 2)?.selected).toEqual([2]);
    expect(automation.submitCalls).toBe(1);
    expect(automation.disconnectCalls).toBe(1);
    expect(eventTypes(events)).toEqual([
      'run_started',
      'question_identified',
      'answer_applied',
      'question_identified',
      'answer_applied',
      'question_identified',
      'answer_applied',
      'submitted',
      'run_completed',
    ]);
  });

  test('paginates once across two pages', async () => {
    const { automation, orchestrator, events } = buildRun(
      [
        { questions: [mcq('Page one, first'), mcq('Page one, second')], hasNext: true },
        { questions: [mcq('Page two, only')] },
      ],
      ['ANSWER: A', 'ANSWER: B', 'ANSWER: D'],
    );

    const result = await orchestrator.run();

    expect(result).toMatchObject({ finalState: 'Submitted', questionsAnswered: 3, pagesVisited: 2, iterationsUsed: 5 });
    expect(automation.currentPageIndex).toBe(1);
    expect(automation.hasNextCalls).toBe(2);
    expect(automation.questionState(1, 0)?.selected).toEqual([3]);
    expect(eventTypes(events).filter((type) => type === 'page_advanced')).toHaveLength(1);
    expect(automation.submitCalls).toBe(1);
  });

  test('a malformed answer is recovered by one corrective request', async () => {
    const { automation, reasoner, orchestrator, solveEvents } = buildRun(
      [{ questions: [mcq('Which is second?')] }],
      ['I believe it is the second one.', 'ANSWER: B'],
    );

    const result = await orchestrator.run();

    expect(result).toMatchObject({ finalState: 'Submitted', questionsAnswered: 1 });
    expect(reasoner.requests).toHaveLength(2);
    expect(eventTypes(solveEvents).filter((type) => type === 'solve_corrective')).toHaveLength(1);
    expect(automation.questionState(0, 0)?.selected).toEqual([1]);
  });

  test('an answer malformed twice fails the run with the solve error', async () => {
    const { automation, orchestrator, events } = buildRun(
      [{ questions: [mcq('Easy one'), mcq('Hard one')] }],
      ['ANSWER: A', 'Hmm, hard to say.', 'Still hard to say.'],
    );

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Failed');
    expect(result.questionsAnswered).toBe(1);
    expect(result.failureCause).toMatchObject({
      kind: 'solve',
      reason: 'missing',
      rawResponse: 'Still hard to say.',
      questionsAnswered: 1,
      question: { prompt: 'Hard one', kind: 'multiple_choice' },
    });
    expect(automation.submitCalls).toBe(0);
    expect(automation.disconnectCalls).toBe(1);
    expect(eventTypes(events).at(-1)).toBe('run_failed');
  });
});

// ── Question kinds and scope ─────────────────────────────────────────────

describe('Quiz run: question kinds', () => {
  test('true/false answers click the matching choice and text answers fill the input', async () => {
    const { automation, orchestrator } = buildRun(
      [
        {
          questions: [
            { prompt: 'Water boils at 50°C at sea level.', kind: 'true_false', options: ['True', 'False'] },
            { prompt: '2 + 2 = ____', kind: 'fill_in_blank' },
          ],
        },
      ],
      ['ANSWER: FALSE', 'Simple sum.\nANSWER: 4'],
    );

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Submitted');
    expect(automation.questionState(0, 0)?.selected).toEqual([1]);
    expect(automation.questionState(0, 1)?.value).toBe('4');
  });

  test('multi-select answers click every chosen option', async () => {
    const { automation, orchestrator } = buildRun(
      [{ questions: [{ prompt: 'Which are even?', kind: 'multiple_choice', options: ['1', '2', '3', '4'], multiSelect: true }] }],
      ['ANSWER: B, D'],
    );

    await orchestrator.run();
    expect(automation.questionState(0, 0)?.selected).toEqual([1, 3]);
  });

  test('questions outside the directive are skipped and not counted', async () => {
    const { automation, locator, reasoner, orchestrator, events } = buildRun(
      [
        {
          questions: [
            mcq('Pick one'),
            { prompt: 'The earth is round.', kind: 'true_false', options: ['True', 'False'] },
          ],
        },
      ],
      ['ANSWER: C'],
    );

    const result = await orchestrator.run('only multiple choice');

    expect(result.finalState).toBe('Submitted');
    expect(result.questionsAnswered).toBe(1);
    expect(result.skippedQuestions).toEqual([{ pageIndex: 0, prompt: 'The earth is round.', kind: 'true_false' }]);
    expect(reasoner.requests).toHaveLength(1);
    expect(automation.questionState(0, 1)?.answered).toBe(false);
    expect(locator.scopes.at(-1)).toEqual({
      directive: 'only multiple choice',
      exclude: [
        { prompt: 'Pick one', affordanceIds: ['p0-q0-o0', 'p0-q0-o1', 'p0-q0-o2', 'p0-q0-o3'] },
        { prompt: 'The earth is round.', affordanceIds: ['p0-q1-o0', 'p0-q1-o1'] },
      ],
    });
    expect(eventTypes(events)).toContain('question_skipped');
  });

  test('questions sharing a prompt on one page are each answered', async () => {
    const { automation, reasoner, orchestrator } = buildRun(
      [{ questions: [mcq('Choose the correct option.'), mcq('Choose the correct option.')] }],
      ['ANSWER: A', 'ANSWER: C'],
    );

    const result = await orchestrator.run();

    expect(result).toMatchObject({ finalState: 'Submitted', questionsAnswered: 2 });
    expect(automation.questionState(0, 0)?.selected).toEqual([0]);
    expect(automation.questionState(0, 1)?.selected).toEqual([2]);
    expect(reasoner.requests).toHaveLength(2);
  });

  test('a page without questions goes straight to pagination', async () => {
    const { orchestrator } = buildRun([{ questions: [], hasNext: true }, { questions: [mcq('Only one')] }], ['ANSWER: A']);

    const result = await orchestrator.run();
    expect(result).toMatchObject({ finalState: 'Submitted', questionsAnswered: 1, pagesVisited: 2 });
  });
});

// ── Failures and limits ──────────────────────────────────────────────────

describe('Quiz run: failures', () => {
  test('an operator that reports an answered question again fails the run instead of answering twice', async () => {
    let locateCalls = 0;
    const { automation, reasoner, orchestrator } = buildRun([{ questions: [mcq('Only')] }], ['ANSWER: A'], {
      operatorLocator: {
        identity: { provider: 'openai', model: 'stale-operator' },
        locate: async () => {
          locateCalls++;
          return {
            prompt: 'Only',
            kind: 'multiple_choice',
            options: ['Alpha', 'Beta', 'Gamma', 'Delta'],
            bindings: { optionAffordances: ['p0-q0-o0', 'p0-q0-o1', 'p0-q0-o2', 'p0-q0-o3'] },
          };
        },
      },
    });

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Failed');
    expect(result.failureCause).toMatchObject({
      kind: 'perception',
      message: 'Operator reported an already handled question: "Only"',
      questionsAnswered: 1,
    });
    expect(locateCalls).toBe(4);
    expect(reasoner.requests).toHaveLength(1);
    expect(automation.submitCalls).toBe(0);
  });

  test('the iteration budget ends the run before submission', async () => {
    const { automation, orchestrator } = buildRun(
      [{ questions: [mcq('One'), mcq('Two'), mcq('Three')] }],
      ['ANSWER: A', 'ANSWER: A', 'ANSWER: A'],
      { maxIterations: 3 },
    );

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Failed');
    expect(result.iterationsUsed).toBe(3);
    expect(result.failureCause).toEqual({
      kind: 'budget_exceeded',
      message: 'Iteration budget exhausted after 3/3 iterations (3 questions answered)',
      questionsAnswered: 3,
    });
    expect(automation.submitCalls).toBe(0);
  });

  test('no submit control is a failure, not a silent success', async () => {
    const { orchestrator } = buildRun([{ questions: [mcq('Only')] }], ['ANSWER: A'], { submitAvailable: false });

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Failed');
    expect(result.failureCause).toMatchObject({ kind: 'affordance_not_found', affordance: 'submit', questionsAnswered: 1 });
  });

  test('an option the page will not accept fails with the attempted answer', async () => {
    const { automation, orchestrator } = buildRun([{ questions: [mcq('Stuck')] }], ['ANSWER: B'], {
      failingAffordances: ['p0-q0-o1'],
    });

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Failed');
    expect(result.failureCause).toMatchObject({
      kind: 'affordance_not_found',
      affordance: 'option',
      attemptedAnswer: 'B',
      question: { prompt: 'Stuck' },
      questionsAnswered: 0,
    });
    expect(automation.actions.filter((a) => a.affordanceId === 'p0-q0-o1')).toHaveLength(3);
  });

  test('transient page failures are retried', async () => {
    const { automation, orchestrator } = buildRun([{ questions: [mcq('Flaky')] }], ['ANSWER: A'], { transientActFailures: 1 });

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Submitted');
    expect(automation.questionState(0, 0)?.selected).toEqual([0]);
  });

  test('cancellation fails the run and detaches without closing the browser', async () => {
    const controller = new AbortController();
    const { automation, orchestrator } = buildRun(
      [{ questions: [mcq('Interrupted')] }],
      [
        () => {
          controller.abort();
          return 'ANSWER: A';
        },
      ],
    );

    const result = await orchestrator.run(undefined, { signal: controller.signal });

    expect(result.finalState).toBe('Failed');
    expect(result.failureCause).toMatchObject({ kind: 'cancelled', questionsAnswered: 0 });
    expect(automation.actions).toHaveLength(0);
    expect(automation.disconnectCalls).toBe(1);
  });
});

// ── Submission ───────────────────────────────────────────────────────────

describe('Quiz run: submission', () => {
  test('submits exactly once even when asked again', async () => {
    const { automation, orchestrator } = buildRun([{ questions: [mcq('Last')] }], ['ANSWER: A']);

    let repeated: Promise<boolean> | undefined;
    orchestrator.on((event) => {
      if (event.type === 'submitted') repeated = orchestrator.submitOnce();
    });

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Submitted');
    expect(await repeated).toBe(false);
    expect(await orchestrator.submitOnce()).toBe(false);
    expect(automation.submitCalls).toBe(1);
  });

  test('a submit requested while another is in flight does not reach the page', async () => {
    const { automation, orchestrator, events } = buildRun([{ questions: [mcq('Last')] }], ['ANSWER: A']);

    let concurrent: Promise<boolean> | undefined;
    const submit = automation.submit.bind(automation);
    automation.submit = async () => {
      concurrent ??= orchestrator.submitOnce();
      return submit();
    };

    const result = await orchestrator.run();

    expect(result.finalState).toBe('Submitted');
    expect(await concurrent).toBe(false);
    expect(automation.submitCalls).toBe(1);
    expect(eventTypes(events).filter((type) => type === 'submitted')).toHaveLength(1);
  });
});
