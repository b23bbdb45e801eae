import { describe, expect, test } from 'vitest';
import { ReasoningAgent } from '../../src/agents/ReasoningAgent.js';
import { ParseError, RunCancelledError, SolveError, TransportError } from '../../src/errors.js';
import type { RunEvent } from '../../src/events/RunEventTypes.js';
import { SolveTool } from '../../src/solver/SolveTool.js';
import { lastUserMessage, makeQuestion, ScriptedModelClient, type ScriptedReply } from '../fixtures/scripted.js';

function setup(replies: ScriptedReply[], transportRetries = 2) {
  const client = new ScriptedModelClient(replies);
  const tool = new SolveTool(new ReasoningAgent(client), { transportRetries, timeoutMs: 1_000, backoffMs: 0 });
  const events: RunEvent[] = [];
  tool.on((event) => events.push(event));
  return { client, tool, events };
}

async function solveFailure(tool: SolveTool): Promise<SolveError> {
  try {
    await tool.solve(makeQuestion());
  } catch (err) {
    if (err instanceof SolveError) return err;
    throw err;
  }
  throw new Error('expected a SolveError');
}

describe('SolveTool', () => {
  test('returns the parsed answer from a well-formed response', async () => {
    const { client, tool, events } = setup(['Paris is the capital of France.\nANSWER: B']);
    const answer = await tool.solve(makeQuestion());

    expect(answer.value).toEqual({ type: 'option', index: 1, id: 'B' });
    expect(answer.rationale).toBe('Paris is the capital of France.');
    expect(client.requests).toHaveLength(1);
    expect(events.map((e) => e.type)).toEqual(['solve_started', 'solve_completed']);
  });

  test('sends only the question to the reasoner', async () => {
    const { client, tool } = setup(['ANSWER: B']);
    await tool.solve(makeQuestion({ id: 'q-secret', bindings: { optionAffordances: ['qp-11', 'qp-12', 'qp-13', 'qp-14'] } }));

    const sent = client.requests[0].messages.map((m) => m.content).join('\n');
    expect(sent).not.toContain('qp-11');
    expect(sent).not.toContain('q-secret');
    expect(lastUserMessage(client.requests[0])).toContain('What is the capital of France?');
  });

  test('issues one corrective request when the first response does not parse', async () => {
    const { client, tool, events } = setup(['I am fairly sure it is Paris.', 'ANSWER: B']);
    const answer = await tool.solve(makeQuestion());

    expect(answer.value).toEqual({ type: 'option', index: 1, id: 'B' });
    expect(client.requests).toHaveLength(2);
    expect(client.requests[1].messages).toContainEqual({ role: 'assistant', content: 'I am fairly sure it is Paris.' });
    expect(lastUserMessage(client.requests[1])).toContain('(missing: response has no "ANSWER:" line)');
    expect(events.map((e) => e.type)).toEqual(['solve_started', 'solve_corrective', 'solve_completed']);
  });

  test('fails with the parse error after the corrective request also fails', async () => {
    const { client, tool } = setup(['Paris.', 'Still Paris.', 'ANSWER: B']);
    const err = await solveFailure(tool);

    expect(err.cause).toBeInstanceOf(ParseError);
    expect(err.cause instanceof ParseError ? err.cause.reason : null).toBe('missing');
    expect(err.rawResponse).toBe('Still Paris.');
    expect(err.question.id).toBe('q1');
    expect(client.requests).toHaveLength(2);
  });

  test('does not retry a well-formed answer', async () => {
    const { client, tool } = setup(['Not sure at all, guessing.\nANSWER: A', 'ANSWER: B']);
    const answer = await tool.solve(makeQuestion());
    expect(answer.value).toEqual({ type: 'option', index: 0, id: 'A' });
    expect(client.requests).toHaveLength(1);
  });

  test('retries transient transport failures', async () => {
    const { client, tool, events } = setup([new TransportError('rate limited', 'model', true, 429), 'ANSWER: B']);
    const answer = await tool.solve(makeQuestion());

    expect(answer.value).toEqual({ type: 'option', index: 1, id: 'B' });
    expect(client.requests).toHaveLength(2);
    expect(events.map((e) => e.type)).toEqual(['solve_started', 'solve_retry', 'solve_completed']);
  });

  test('gives up after the transport retry budget', async () => {
    const transient = () => new TransportError('upstream 503', 'model', true, 503);
    const { client, tool } = setup([transient(), transient(), transient(), 'ANSWER: B'], 2);
    const err = await solveFailure(tool);

    expect(err.cause).toBeInstanceOf(TransportError);
    expect(err.cause.message).toBe('upstream 503');
    expect(client.requests).toHaveLength(3);
  });

  test('does not retry non-transient transport failures', async () => {
    const { client, tool } = setup([new TransportError('invalid api key', 'model', false, 401), 'ANSWER: B']);
    const err = await solveFailure(tool);

    expect(err.cause).toBeInstanceOf(TransportError);
    expect(client.requests).toHaveLength(1);
  });

  test('stops when the signal is aborted', async () => {
    const { client, tool } = setup(['ANSWER: B']);
    const controller = new AbortController();
    controller.abort();

    await expect(tool.solve(makeQuestion(), controller.signal)).rejects.toBeInstanceOf(RunCancelledError);
    expect(client.requests).toHaveLength(0);
  });

  test('times out a hanging reasoner as a transient failure', async () => {
    const client = new ScriptedModelClient([() => new Promise<string>(() => {}), 'ANSWER: C']);
    const tool = new SolveTool(new ReasoningAgent(client), { transportRetries: 1, timeoutMs: 20, backoffMs: 0 });

    const answer = await tool.solve(makeQuestion());
    expect(answer.value).toEqual({ type: 'option', index: 2, id: 'C' });
    expect(client.requests).toHaveLength(2);
  });
});
