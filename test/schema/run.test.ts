import { describe, it, expect } from 'vitest';

import { orderedSteps, parameterSetsOf, parseTestCaseJob } from '../../src/schema/job.js';
import {
  aggregateVisualStatus,
  finalizeStatuses,
  mergeVisualStatus,
} from '../../src/schema/run.js';
import { LOGIN_URL } from '../helpers/jobs.js';

describe('visual status aggregation', () => {
  it('is N/A with no visual checks', () => {
    expect(aggregateVisualStatus([])).toBe('N/A');
  });

  it('lets FAIL dominate', () => {
    expect(aggregateVisualStatus(['PASS', 'FAIL', 'BASELINE_CREATED'])).toBe('FAIL');
  });

  it('prefers BASELINE_CREATED over PASS', () => {
    expect(aggregateVisualStatus(['PASS', 'BASELINE_CREATED', 'PASS'])).toBe('BASELINE_CREATED');
    expect(mergeVisualStatus('BASELINE_CREATED', 'N/A')).toBe('BASELINE_CREATED');
  });
});

describe('finalizeStatuses', () => {
  it('reports visual PASS for a passing run without visual steps', () => {
    expect(finalizeStatuses(true, 'N/A')).toEqual({ status: 'PASS', visualStatus: 'PASS' });
  });

  it('fails the run on a visual failure', () => {
    expect(finalizeStatuses(true, 'FAIL')).toEqual({ status: 'FAIL', visualStatus: 'FAIL' });
  });

  it('keeps the visual status of a functional failure', () => {
    expect(finalizeStatuses(false, 'N/A')).toEqual({ status: 'FAIL', visualStatus: 'N/A' });
    expect(finalizeStatuses(false, 'BASELINE_CREATED')).toEqual({
      status: 'FAIL',
      visualStatus: 'BASELINE_CREATED',
    });
  });
});

describe('job parsing', () => {
  const base = {
    test_case_id: 'TC-3',
    target_url: LOGIN_URL,
    steps: [
      { step_number: 2, action: 'CLICK', target_element: 'login' },
      { step_number: 1, action: 'ENTER_TEXT', target_element: 'username', data_key: 'username' },
    ],
  };

  it('orders steps by step number', () => {
    const job = parseTestCaseJob(base);

    expect(orderedSteps(job).map((s) => s.step_number)).toEqual([1, 2]);
  });

  it('coerces dataset values to strings', () => {
    const job = parseTestCaseJob({ ...base, parameters: [{ dataset_name: 'n', data: { pin: 1234 } }] });

    expect(parameterSetsOf(job)).toEqual([{ dataset_name: 'n', data: { pin: '1234' } }]);
  });

  it('supplies a default dataset', () => {
    expect(parameterSetsOf(parseTestCaseJob(base))).toEqual([{ dataset_name: 'default', data: {} }]);
  });

  it('rejects duplicate logical names in the blueprint', () => {
    expect(() =>
      parseTestCaseJob({
        ...base,
        ui_blueprint: [{ logical_name: 'login' }, { logical_name: 'login' }],
      }),
    ).toThrow(/Duplicate logical_name/);
  });
});
