/**
 * HTTP Tool Executor Tests
 *
 * Runs the executor against an in-process Hono stand-in for the analytics
 * tool service. Every failure path must come back as a failed outcome.
 */

import { vi, describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';

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

import { HttpToolExecutor, serializeOutcome, toolFailure } from '../tools/tool-executor.js';

// ─── Stand-in tool service ────────────────────────────────────────────────────

interface ExecuteBody {
  tool_name: string;
  arguments: Record<string, unknown>;
}

const MERCHANTS: Partial<Record<string, { merchant_id: string; name: string; current_risk_status: string }>> = {
  M1005: { merchant_id: 'M1005', name: 'Test Merchant', current_risk_status: 'Low' },
};

function createToolService(received: ExecuteBody[]) {
  const app = new Hono();

  app.get('/tools', (c) =>
    c.json([
      { name: 'get_profile', description: 'Gets profile information for a specific merchant ID.' },
      { name: 'get_aggregated_stats', description: 'Aggregated transaction statistics.' },
    ]),
  );

  app.post('/execute', async (c) => {
    const body = await c.req.json<ExecuteBody>();
    received.push(body);
    const subjectId = String(body.arguments.subject_id);

    switch (body.tool_name) {
      case 'get_profile': {
        const merchant = MERCHANTS[subjectId];
        return c.json({ result: merchant ?? { error: `Merchant ID ${subjectId} not found.` } });
      }
      case 'get_aggregated_stats':
        return c.json({ result: { merchant_id: subjectId, transaction_count: 42, total_amount: 1234.5 } });
      case 'get_flagged_examples':
        return new Promise<Response>(() => undefined);
      case 'set_risk_status':
        return c.json({ error: `Internal server error executing tool 'set_risk_status': disk full` }, 500);
      case 'open_review_case':
        return c.text('<html>Bad Gateway</html>', 502);
      default:
        return c.json({ error: `Tool '${body.tool_name}' not found.` }, 404);
    }
  });

  return app;
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('HttpToolExecutor', () => {
  let received: ExecuteBody[];
  let executor: HttpToolExecutor;

  beforeEach(() => {
    received = [];
    const app = createToolService(received);
    executor = new HttpToolExecutor({
      baseUrl: 'http://tools.test/',
      timeoutMs: 20,
      fetchImpl: async (input, init) => app.request(input, init),
    });
  });

  it('posts the tool name and validated arguments and returns the result', async () => {
    const args = { subject_id: 'M1005', start: '2024-05-01T00:00:00', end: '2024-05-31T00:00:00' };

    const outcome = await executor.execute('get_aggregated_stats', args);

    expect(received).toEqual([{ tool_name: 'get_aggregated_stats', arguments: args }]);
    expect(outcome).toEqual({
      ok: true,
      value: { merchant_id: 'M1005', transaction_count: 42, total_amount: 1234.5 },
    });
  });

  it('reports an error embedded in the result as a tool error', async () => {
    const outcome = await executor.execute('get_profile', { subject_id: 'M9999' });

    expect(outcome).toEqual(toolFailure('tool_error', 'Merchant ID M9999 not found.'));
  });

  it('reports a structured service error as a tool error', async () => {
    const outcome = await executor.execute('set_risk_status', {
      subject_id: 'M1005',
      new_status: 'High',
      reason_code: 'VELOCITY',
    });

    expect(outcome).toEqual(
      toolFailure('tool_error', "Internal server error executing tool 'set_risk_status': disk full"),
    );
  });

  it('rejects arguments that do not match the tool schema without calling the service', async () => {
    const missing = await executor.execute('get_profile', {});
    const badDate = await executor.execute('get_aggregated_stats', {
      subject_id: 'M1005',
      start: 'May 1st',
      end: '2024-05-31T00:00:00',
    });

    expect(missing).toEqual(toolFailure('argument_mismatch', "Argument mismatch for tool 'get_profile': subject_id: Required"));
    expect(badDate).toEqual(
      toolFailure(
        'argument_mismatch',
        "Argument mismatch for tool 'get_aggregated_stats': start: expected ISO date-time (YYYY-MM-DDTHH:MM:SS)",
      ),
    );
    expect(received).toEqual([]);
  });

  it('refuses an unknown tool name', async () => {
    const outcome = await executor.execute('drop_tables', {});

    expect(outcome).toEqual(toolFailure('unknown_tool', 'Unknown tool: drop_tables'));
    expect(received).toEqual([]);
  });

  it('times out a call the service never answers', async () => {
    const outcome = await executor.execute('get_flagged_examples', {
      subject_id: 'M1005',
      start: '2024-05-01T00:00:00',
      end: '2024-05-31T00:00:00',
    });

    expect(outcome).toEqual(toolFailure('timeout', "Tool 'get_flagged_examples' timed out after 20ms"));
  });

  it('reports a non-JSON response body', async () => {
    const outcome = await executor.execute('open_review_case', {
      subject_id: 'M1005',
      category: 'Velocity',
      summary: 'Spike',
      indicators: [],
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.code).toBe('tool_error');
    expect(outcome.error.message).toMatch(/^Tool service returned invalid JSON \(status 502\): /);
  });

  it('reports a body with neither result nor error', async () => {
    const app = new Hono();
    app.post('/execute', (c) => c.json({ ok: true }));
    const odd = new HttpToolExecutor({
      baseUrl: 'http://tools.test',
      timeoutMs: 1000,
      fetchImpl: async (input, init) => app.request(input, init),
    });

    const outcome = await odd.execute('get_profile', { subject_id: 'M1005' });

    expect(outcome).toEqual(toolFailure('tool_error', 'Tool service returned an unexpected body (status 200)'));
  });

  it('reports a connection failure as a transport error', async () => {
    const down = new HttpToolExecutor({
      baseUrl: 'http://tools.test',
      timeoutMs: 1000,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const outcome = await down.execute('get_profile', { subject_id: 'M1005' });

    expect(outcome).toEqual(toolFailure('transport', 'Tool service connection error: fetch failed'));
  });

  it('reports a caller abort', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await executor.execute('get_profile', { subject_id: 'M1005' }, controller.signal);

    expect(outcome).toEqual(toolFailure('aborted', "Tool 'get_profile' was aborted"));
  });

  it('lists the tools the service exposes', async () => {
    await expect(executor.listTools()).resolves.toEqual([
      { name: 'get_profile', description: 'Gets profile information for a specific merchant ID.' },
      { name: 'get_aggregated_stats', description: 'Aggregated transaction statistics.' },
    ]);
  });

  it('fails the listing on a non-ok status', async () => {
    const app = new Hono();
    app.get('/tools', (c) => c.json({ error: 'down' }, 503));
    const broken = new HttpToolExecutor({
      baseUrl: 'http://tools.test',
      timeoutMs: 1000,
      fetchImpl: async (input, init) => app.request(input, init),
    });

    await expect(broken.listTools()).rejects.toThrow('Tool listing failed with status 503');
  });
});

describe('serializeOutcome', () => {
  it('serializes a success value as JSON', () => {
    expect(serializeOutcome({ ok: true, value: { case_id: 'CASE-1' } })).toBe('{"case_id":"CASE-1"}');
  });

  it('serializes an empty success as an empty object', () => {
    expect(serializeOutcome({ ok: true, value: null })).toBe('{}');
  });

  it('serializes a failure with its message and code', () => {
    expect(serializeOutcome(toolFailure('timeout', 'slow'))).toBe('{"error":"slow","code":"timeout"}');
  });
});
