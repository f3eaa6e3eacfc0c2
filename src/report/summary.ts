import type { RunOutcome, StepRecord } from '../schema/run.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the output contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

export interface JsonOutput {
  version: typeof JSON_OUTPUT_VERSION;
  testCaseId: string;
  summary: 'PASS' | 'FAIL';
  exitCode: number;
  runs: RunOutcome[];
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  testCaseId: string,
  runs: readonly RunOutcome[],
): JsonOutput {
  const summary = runs.every((r) => r.status === 'PASS') ? 'PASS' : 'FAIL';
  return {
    version: JSON_OUTPUT_VERSION,
    testCaseId,
    summary,
    exitCode: summary === 'PASS' ? 0 : 1,
    runs: [...runs],
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(testCaseId: string, runs: readonly RunOutcome[]): string {
  const lines: string[] = [];

  lines.push(`# Test Case ${testCaseId}`);
  lines.push('');

  for (const run of runs) {
    lines.push(`## Dataset: ${run.datasetName}`);
    lines.push('');
    lines.push(`| Field | Value |`);
    lines.push(`|-------|-------|`);
    lines.push(`| **Run ID** | \`${run.runId ?? 'n/a'}\` |`);
    lines.push(`| **Status** | **${run.status}** |`);
    lines.push(`| **Visual** | ${run.visualStatus} |`);
    lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
    lines.push(`| **Artifacts** | \`${run.artifactsPath}\` |`);
    if (run.failureReason !== undefined) {
      lines.push(`| **Failure** | ${escapeMarkdownCell(run.failureReason)} |`);
    }
    lines.push('');

    lines.push(`| # | Action | Target | Result | Reason |`);
    lines.push(`|---|--------|--------|--------|--------|`);
    for (const step of run.steps) {
      lines.push(stepRow(step));
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function stepRow(step: StepRecord): string {
  const result =
    step.visualStatus !== 'N/A' ? `${step.status} (${step.visualStatus})` : step.status;
  return `| ${String(step.stepNumber)} | ${step.action} | ${escapeMarkdownCell(step.target)} | ${result} | ${escapeMarkdownCell(step.reason ?? '')} |`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
