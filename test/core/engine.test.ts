import { describe, it, expect } from 'vitest';

import { loadWorkerConfig } from '../../src/config/loader.js';
import { createCollaborators, createEngine } from '../../src/core/engine.js';
import { createFakeLauncher } from '../helpers/fakes.js';
import { SEL, loginJob } from '../helpers/jobs.js';

describe('engine wiring', () => {
  it('runs jobs offline with local run ids', async () => {
    const config = loadWorkerConfig({}, { timeouts: { elementVisibleMs: 1000 } });
    const launcher = createFakeLauncher((page) => {
      page.visible.add(SEL.username).add(SEL.password).add(SEL.login);
      page.revealOnClick.set(SEL.login, [SEL.home]);
    });
    const collaborators = {
      ...(await createCollaborators(config, { offline: true })),
      launch: launcher.launch,
    };

    const job = loginJob({
      parameters: [
        { dataset_name: 'first', data: {} },
        { dataset_name: 'second', data: {} },
      ],
    });
    const outcomes = await createEngine(config, collaborators).runJob(job);

    expect(outcomes.map((o) => [o.runId, o.status])).toEqual([
      ['local-1', 'PASS'],
      ['local-2', 'PASS'],
    ]);
  });
});
