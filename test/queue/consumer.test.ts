import { describe, it, expect, vi } from 'vitest';

import type { RunController } from '../../src/core/runController.js';
import {
  MalformedJobError,
  handleDelivery,
  parseJobMessage,
  runConsumer,
} from '../../src/queue/consumer.js';
import type { DeliveryResult } from '../../src/queue/consumer.js';
import { brokerConfigSchema } from '../../src/schema/config.js';
import type { RunOutcome } from '../../src/schema/run.js';
import { FakeConnection, createFakeChannel } from '../helpers/broker.js';
import { LOGIN_URL } from '../helpers/jobs.js';

const broker = brokerConfigSchema.parse({ queue: 'execution_queue' });

const JOB = {
  test_case_id: 'TC-7',
  target_url: LOGIN_URL,
  steps: [{ step_number: 1, action: 'VERIFY_ELEMENT_VISIBLE', target_element: 'page_title' }],
};

function message(body: unknown) {
  return { content: Buffer.from(typeof body === 'string' ? body : JSON.stringify(body)) };
}

function fakeController(runs: RunOutcome[] = []) {
  return { runJob: vi.fn(async () => runs) } satisfies RunController;
}

/** Controller whose first job blocks until `release` is called. */
function gatedController() {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const state = { calls: 0, active: 0, maxActive: 0 };
  const controller = {
    runJob: vi.fn(async (): Promise<RunOutcome[]> => {
      state.calls++;
      state.active++;
      state.maxActive = Math.max(state.maxActive, state.active);
      if (state.calls === 1) await gate;
      state.active--;
      return [];
    }),
  } satisfies RunController;
  return { controller, state, release: () => release() };
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('parseJobMessage', () => {
  it('applies defaults to a minimal job', () => {
    const job = parseJobMessage(message(JOB).content);

    expect(job).toMatchObject({
      test_case_id: 'TC-7',
      objective: '',
      is_live_view: false,
      ui_blueprint: [],
      parameters: [],
    });
  });

  it('lists missing keys', () => {
    expect(() => parseJobMessage(message({}).content)).toThrow(
      'Malformed job: test_case_id: Required; target_url: Required; steps: Required',
    );
  });

  it('rejects invalid JSON', () => {
    try {
      parseJobMessage(message('{not json').content);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedJobError);
      expect(err instanceof MalformedJobError && err.issues[0]?.startsWith('invalid JSON (')).toBe(
        true,
      );
    }
  });

  it('rejects unknown actions', () => {
    const bad = { ...JOB, steps: [{ step_number: 1, action: 'HOVER', target_element: 'x' }] };

    expect(() => parseJobMessage(message(bad).content)).toThrow(/^Malformed job: steps\.0\.action: /);
  });
});

describe('handleDelivery', () => {
  it('runs a valid job', async () => {
    const controller = fakeController();

    const result = await handleDelivery(message(JOB).content, controller);

    expect(result).toEqual({ outcome: 'processed', testCaseId: 'TC-7', runs: [] });
    expect(controller.runJob).toHaveBeenCalledTimes(1);
  });

  it('reports a malformed job without running it', async () => {
    const controller = fakeController();

    const result = await handleDelivery(message({ steps: [] }).content, controller);

    expect(result.outcome).toBe('malformed');
    expect(controller.runJob).not.toHaveBeenCalled();
  });

  it('reports a job that could not be dispatched', async () => {
    const error = new Error('browser pool exhausted');
    const controller: RunController = { runJob: vi.fn(async () => Promise.reject(error)) };

    const result = await handleDelivery(message(JOB).content, controller);

    expect(result).toEqual({ outcome: 'dispatch_error', testCaseId: 'TC-7', error });
  });
});

describe('runConsumer', () => {
  it('consumes one message at a time and acks every delivery', async () => {
    const channel = createFakeChannel();
    const connection = new FakeConnection(channel);
    const abort = new AbortController();
    const controller = fakeController();
    const results: DeliveryResult[] = [];

    const done = runConsumer({
      connect: async () => connection,
      broker,
      controller,
      signal: abort.signal,
      onDelivery: (result) => results.push(result),
    });
    await channel.consuming;

    const bad = message('{not json');
    channel.deliver(bad);
    await vi.waitFor(() => expect(results).toHaveLength(1));

    const good = message(JOB);
    channel.deliver(good);
    await vi.waitFor(() => expect(results).toHaveLength(2));

    abort.abort();
    await done;

    expect(channel.asserted).toEqual(['execution_queue']);
    expect(channel.prefetched).toEqual([1]);
    expect(results.map((r) => r.outcome)).toEqual(['malformed', 'processed']);
    expect(channel.acked).toEqual([bad, good]);
    expect(connection.closed).toBe(true);
  });

  it('reconnects after a refused or lost connection', async () => {
    const abort = new AbortController();
    const connection = new FakeConnection(createFakeChannel());
    const sleeps: number[] = [];
    let attempts = 0;

    await runConsumer({
      connect: async () => {
        attempts++;
        if (attempts === 1) throw new Error('connect ECONNREFUSED');
        if (attempts === 2) {
          setImmediate(() => {
            void connection.close();
          });
          return connection;
        }
        abort.abort();
        throw new Error('stopped');
      },
      broker,
      controller: fakeController(),
      signal: abort.signal,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(attempts).toBe(3);
    expect(sleeps).toEqual([5000, 5000]);
  });

  it('reconnects when the broker cancels the consumer', async () => {
    const abort = new AbortController();
    const channel = createFakeChannel();
    const connection = new FakeConnection(channel);
    let attempts = 0;

    const done = runConsumer({
      connect: async () => {
        attempts++;
        if (attempts === 1) return connection;
        abort.abort();
        throw new Error('stopped');
      },
      broker,
      controller: fakeController(),
      signal: abort.signal,
      sleep: async () => {},
    });
    await channel.consuming;
    channel.deliver(null);
    await done;

    expect(connection.closed).toBe(true);
    expect(attempts).toBe(2);
  });

  it('finishes and acks the job in flight before stopping', async () => {
    const channel = createFakeChannel();
    const connection = new FakeConnection(channel);
    const abort = new AbortController();
    const { controller, release } = gatedController();
    let stopped = false;

    const done = runConsumer({
      connect: async () => connection,
      broker,
      controller,
      signal: abort.signal,
    }).then(() => {
      stopped = true;
    });
    await channel.consuming;

    const job = message(JOB);
    channel.deliver(job);
    await vi.waitFor(() => expect(controller.runJob).toHaveBeenCalledTimes(1));

    abort.abort();
    await nextTick();
    channel.deliver(message(JOB));
    await nextTick();

    expect(stopped).toBe(false);
    expect(channel.cancelled).toEqual(['test-consumer']);
    expect(connection.closed).toBe(false);

    release();
    await done;

    expect(channel.acked).toEqual([job]);
    expect(controller.runJob).toHaveBeenCalledTimes(1);
    expect(connection.closed).toBe(true);
  });

  it('does not reconnect while a job from the lost connection is still running', async () => {
    const abort = new AbortController();
    const first = createFakeChannel();
    const second = createFakeChannel();
    const connections = [new FakeConnection(first), new FakeConnection(second)];
    const { controller, state, release } = gatedController();
    const results: DeliveryResult[] = [];
    let attempts = 0;

    const done = runConsumer({
      connect: async () => {
        const connection = connections[attempts++];
        if (!connection) throw new Error('no more connections');
        return connection;
      },
      broker,
      controller,
      signal: abort.signal,
      sleep: async () => {},
      onDelivery: (result) => results.push(result),
    });
    await first.consuming;

    first.deliver(message(JOB));
    await vi.waitFor(() => expect(state.calls).toBe(1));
    connections[0]?.drop();
    await nextTick();
    expect(attempts).toBe(1);

    release();
    await second.consuming;
    expect(attempts).toBe(2);

    const redelivered = message(JOB);
    second.deliver(redelivered);
    await vi.waitFor(() => expect(results).toHaveLength(2));
    abort.abort();
    await done;

    expect(state.maxActive).toBe(1);
    expect(first.acked).toEqual([]);
    expect(second.acked).toEqual([redelivered]);
  });

  it('logs channel errors and reconnects when the server closes the channel', async () => {
    const abort = new AbortController();
    const channel = createFakeChannel();
    const connection = new FakeConnection(channel);
    let attempts = 0;

    const done = runConsumer({
      connect: async () => {
        attempts++;
        if (attempts === 1) return connection;
        abort.abort();
        throw new Error('stopped');
      },
      broker,
      controller: fakeController(),
      signal: abort.signal,
      sleep: async () => {},
    });
    await channel.consuming;

    expect(() =>
      channel.emit('error', new Error('Channel closed by server: 406 PRECONDITION_FAILED')),
    ).not.toThrow();
    channel.closed = true;
    channel.emit('close');
    await done;

    expect(attempts).toBe(2);
    expect(connection.closed).toBe(true);
  });
});
