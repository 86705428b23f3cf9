/**
 * Assistants Provider Tests
 *
 * Covers the REST mapping onto the ReasoningEngine contract with a stubbed
 * fetch: request shapes, run status mapping, tool-call extraction, error
 * wrapping and which requests are retried.
 */

import { vi, describe, it, expect, beforeEach } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
  return { default: noopLogger, createSessionLogger: vi.fn(() => noopLogger) };
});

import { AssistantsProvider, mapRunStatus } from '../lib/assistants-provider.js';
import { EngineRequestError } from '../lib/errors.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function rawRun(fields: Record<string, unknown>) {
  return { id: 'run_1', thread_id: 'thread_1', object: 'thread.run', last_error: null, ...fields };
}

const fetchMock = vi.fn<typeof fetch>();

function requestAt(index: number): { url: string; method: string | undefined; body: unknown } {
  const [input, init] = fetchMock.mock.calls[index];
  return {
    url: String(input),
    method: init?.method,
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}

let provider: AssistantsProvider;

beforeEach(() => {
  fetchMock.mockReset();
  provider = new AssistantsProvider({
    apiKey: 'test-secret',
    baseUrl: 'https://engine.test/v1/',
    fetchImpl: fetchMock,
    retryBaseDelayMs: 1,
  });
});

// ─── Status mapping ───────────────────────────────────────────────────────────

describe('mapRunStatus', () => {
  it.each([
    ['queued', 'queued'],
    ['in_progress', 'in_progress'],
    ['cancelling', 'in_progress'],
    ['requires_action', 'requires_tool_output'],
    ['completed', 'completed'],
    ['failed', 'failed'],
    ['cancelled', 'cancelled'],
    ['expired', 'expired'],
    ['incomplete', 'failed'],
    ['paused', 'in_progress'],
  ])('maps %s to %s', (raw, expected) => {
    expect(mapRunStatus(raw)).toBe(expected);
  });
});

// ─── Runs ─────────────────────────────────────────────────────────────────────

describe('AssistantsProvider: runs', () => {
  it('extracts pending tool calls from a run that requires action', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({
      status: 'requires_action',
      required_action: {
        type: 'submit_tool_outputs',
        submit_tool_outputs: {
          tool_calls: [
            { id: 'call_1', type: 'function', function: { name: 'get_profile', arguments: '{"subject_id":"M1005"}' } },
          ],
        },
      },
    })));

    const snapshot = await provider.getRun({ id: 'run_1', contextId: 'thread_1' });

    expect(snapshot).toEqual({
      id: 'run_1',
      contextId: 'thread_1',
      status: 'requires_tool_output',
      pendingToolCalls: [{ token: 'call_1', name: 'get_profile', rawArguments: '{"subject_id":"M1005"}' }],
    });
    expect(requestAt(0)).toEqual({ url: 'https://engine.test/v1/threads/thread_1/runs/run_1', method: 'GET', body: undefined });
  });

  it('sends the auth and beta headers', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({ status: 'queued' })));

    await provider.getRun({ id: 'run_1', contextId: 'thread_1' });

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'Authorization': 'Bearer test-secret',
      'OpenAI-Beta': 'assistants=v2',
    });
  });

  it('describes a failed run from last_error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({
      status: 'failed',
      last_error: { code: 'rate_limit_exceeded', message: 'You exceeded your current quota.' },
    })));

    const snapshot = await provider.getRun({ id: 'run_1', contextId: 'thread_1' });

    expect(snapshot.status).toBe('failed');
    expect(snapshot.lastError).toBe('rate_limit_exceeded: You exceeded your current quota.');
  });

  it('treats an incomplete run as failed with its reason', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({
      status: 'incomplete',
      incomplete_details: { reason: 'max_completion_tokens' },
    })));

    const snapshot = await provider.getRun({ id: 'run_1', contextId: 'thread_1' });

    expect(snapshot.status).toBe('failed');
    expect(snapshot.lastError).toBe('incomplete: max_completion_tokens');
  });

  it('does not retry a failed status check', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 503 }));

    await expect(provider.getRun({ id: 'run_1', contextId: 'thread_1' })).rejects.toBeInstanceOf(EngineRequestError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('creates a run for the agent without instructions', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({ status: 'queued' })));

    const handle = await provider.createRun('thread_1', 'asst_agg');

    expect(handle).toEqual({ id: 'run_1', contextId: 'thread_1' });
    expect(requestAt(0)).toEqual({
      url: 'https://engine.test/v1/threads/thread_1/runs',
      method: 'POST',
      body: { assistant_id: 'asst_agg' },
    });
  });

  it('submits every tool output in one request', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({ status: 'queued' })));

    await provider.submitToolOutputs({ id: 'run_1', contextId: 'thread_1' }, [
      { token: 'call_1', output: '{"merchant_id":"M1005"}' },
      { token: 'call_2', output: '{"error":"Merchant not found","code":"tool_error"}' },
    ]);

    expect(requestAt(0)).toEqual({
      url: 'https://engine.test/v1/threads/thread_1/runs/run_1/submit_tool_outputs',
      method: 'POST',
      body: {
        tool_outputs: [
          { tool_call_id: 'call_1', output: '{"merchant_id":"M1005"}' },
          { tool_call_id: 'call_2', output: '{"error":"Merchant not found","code":"tool_error"}' },
        ],
      },
    });
  });

  it('cancels a run', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(rawRun({ status: 'cancelling' })));

    await provider.cancelRun({ id: 'run_1', contextId: 'thread_1' });

    expect(requestAt(0).url).toBe('https://engine.test/v1/threads/thread_1/runs/run_1/cancel');
  });
});

// ─── Threads and messages ─────────────────────────────────────────────────────

describe('AssistantsProvider: threads and messages', () => {
  it('retries a transient failure when creating a thread', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('overloaded', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ id: 'thread_9', object: 'thread' }));

    await expect(provider.createContext()).resolves.toBe('thread_9');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('wraps a non-transient error without retrying', async () => {
    fetchMock.mockResolvedValueOnce(new Response('invalid model', { status: 400 }));

    const err = await provider.createContext().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EngineRequestError);
    expect(err).toMatchObject({ status: 400, message: 'Engine API error 400 on POST /threads: invalid model' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('appends a user message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      id: 'msg_1',
      role: 'user',
      content: [{ type: 'text', text: { value: 'Please gather data.', annotations: [] } }],
    }));

    const message = await provider.appendMessage('thread_1', 'Please gather data.');

    expect(message).toEqual({ id: 'msg_1', role: 'user', text: 'Please gather data.' });
    expect(requestAt(0).body).toEqual({ role: 'user', content: 'Please gather data.' });
  });

  it('reads the newest message and joins its text blocks', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      data: [{
        id: 'msg_9',
        role: 'assistant',
        content: [
          { type: 'text', text: { value: 'Risk score 82.' } },
          { type: 'image_file', image_file: { file_id: 'file_1' } },
          { type: 'text', text: { value: 'Level: High.' } },
        ],
      }],
    }));

    const message = await provider.getLatestMessage('thread_1');

    expect(message).toEqual({ id: 'msg_9', role: 'assistant', text: 'Risk score 82.\nLevel: High.' });
    expect(requestAt(0).url).toBe('https://engine.test/v1/threads/thread_1/messages?order=desc&limit=1');
  });

  it('returns null for an empty thread', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [] }));

    await expect(provider.getLatestMessage('thread_1')).resolves.toBeNull();
  });

  it('creates an agent with function tools', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'asst_new' }));
    const fn = { name: 'get_profile', description: 'Profile lookup', parameters: { type: 'object' } };

    const id = await provider.createAgent({ name: 'Data Aggregation', instructions: 'Collect data.', model: 'test-model', tools: [fn] });

    expect(id).toBe('asst_new');
    expect(requestAt(0)).toEqual({
      url: 'https://engine.test/v1/assistants',
      method: 'POST',
      body: {
        name: 'Data Aggregation',
        instructions: 'Collect data.',
        model: 'test-model',
        tools: [{ type: 'function', function: fn }],
      },
    });
  });
});
