import { describe, it, expect } from 'vitest';

import { publishJob } from '../../src/queue/publisher.js';
import { createFakeChannel } from '../helpers/broker.js';
import { LOGIN_URL } from '../helpers/jobs.js';

describe('publishJob', () => {
  it('sends the job as a persistent JSON message on a durable queue', async () => {
    const channel = createFakeChannel();
    const job = {
      test_case_id: 'TC-9',
      target_url: LOGIN_URL,
      steps: [{ step_number: 1, action: 'CLICK' as const, target_element: 'login' }],
    };

    await publishJob(channel, 'live_execution_queue', job);

    expect(channel.asserted).toEqual(['live_execution_queue']);
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]?.queue).toBe('live_execution_queue');
    expect(channel.sent[0]?.persistent).toBe(true);
    expect(JSON.parse(channel.sent[0]?.content.toString() ?? '')).toEqual(job);
  });
});
