import { describe, it, expect } from 'vitest';

import { generateJSON, generateMarkdown, serializeJSON } from '../../src/report/summary.js';
import type { RunOutcome } from '../../src/schema/run.js';

const passed: RunOutcome = {
  runId: '42',
  testCaseId: 'TC-Login',
  datasetName: 'valid user',
  status: 'PASS',
  visualStatus: 'PASS',
  artifactsPath: 'runs/tc-login/valid-user-x',
  artifacts: [],
  visualArtifacts: [],
  steps: [
    {
      stepNumber: 1,
      action: 'ENTER_TEXT',
      target: 'username',
      status: 'PASS',
      visualStatus: 'N/A',
      durationMs: 12,
    },
  ],
  startedAt: '2026-01-02T03:04:05.678Z',
  finishedAt: '2026-01-02T03:04:07.178Z',
  durationMs: 1500,
};

const failed: RunOutcome = {
  ...passed,
  runId: '43',
  datasetName: 'locked user',
  status: 'FAIL',
  visualStatus: 'FAIL',
  failureReason: 'a | b',
  steps: [
    {
      stepNumber: 1,
      action: 'VISUAL_VALIDATION',
      target: 'login_page',
      status: 'FAIL',
      visualStatus: 'FAIL',
      reason: 'a | b',
      durationMs: 30,
    },
  ],
  durationMs: 800,
};

describe('generateJSON', () => {
  it('passes only when every run passed', () => {
    expect(generateJSON('TC-Login', [passed])).toMatchObject({
      summary: 'PASS',
      exitCode: 0,
    });
    expect(generateJSON('TC-Login', [passed, failed])).toMatchObject({
      summary: 'FAIL',
      exitCode: 1,
    });
  });

  it('serializes with sorted keys', () => {
    const text = serializeJSON(generateJSON('TC-Login', []));

    expect(text).toBe(
      '{\n  "exitCode": 0,\n  "runs": [],\n  "summary": "PASS",\n  "testCaseId": "TC-Login",\n  "version": "1.0"\n}',
    );
  });
});

describe('generateMarkdown', () => {
  it('writes one section per dataset', () => {
    const lines = generateMarkdown('TC-Login', [passed, failed]).split('\n');

    expect(lines[0]).toBe('# Test Case TC-Login');
    expect(lines).toContain('## Dataset: valid user');
    expect(lines).toContain('| **Duration** | 1.5s |');
    expect(lines).toContain('| 1 | ENTER_TEXT | username | PASS |  |');
    expect(lines).toContain('| **Duration** | 800ms |');
    expect(lines).toContain('| **Failure** | a \\| b |');
    expect(lines).toContain('| 1 | VISUAL_VALIDATION | login_page | FAIL (FAIL) | a \\| b |');
  });
});
