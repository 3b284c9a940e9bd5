/**
 * Human-readable rendering of run results
 */

import type { ActionOutcome, ActionStatus, RunReport } from '../executor/index.js';

const STATUS_TAGS: Record<ActionStatus, string> = {
  passed: '[PASS]',
  failed: '[FAIL]',
  skipped: '[SKIP]',
  errored: '[ERROR]',
};

const PREVIEW_LINES = 5;

export type StatusCounts = Record<ActionStatus, number>;

/**
 * Count outcomes per status
 */
export function summarize(report: RunReport): StatusCounts {
  const counts: StatusCounts = { passed: 0, failed: 0, skipped: 0, errored: 0 };
  for (const outcome of report.outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * One line per outcome, e.g. `[PASS] install#1 run (line 7): Exit code matched: 0`.
 * Failed actions also show what was expected and what came back.
 */
export function formatOutcome(outcome: ActionOutcome): string {
  const { action } = outcome;
  const lines = [
    `${STATUS_TAGS[outcome.status]} ${outcome.stepId}#${outcome.actionIndex + 1} ${action.kind} (line ${action.line}): ${outcome.message}`,
  ];

  if (outcome.status === 'failed') {
    if (outcome.command !== undefined) {
      lines.push(`   Command: ${outcome.command}`);
    }
    if (outcome.expected !== undefined) {
      lines.push(`   Expected: ${preview(outcome.expected)}`);
    }
    if (outcome.actual !== undefined) {
      lines.push(`   Actual: ${preview(outcome.actual)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Summary printed after the run
 */
export function formatReport(report: RunReport): string {
  const counts = summarize(report);
  const total = report.outcomes.length;

  return [
    `Tutorial: ${report.title} (${report.source})`,
    `Workspace: ${report.workspaceRoot}`,
    `Actions: ${counts.passed} passed, ${counts.failed} failed, ${counts.skipped} skipped, ${counts.errored} errored (${total} total)`,
    `Overall Status: ${overallStatus(report, counts)}`,
  ].join('\n');
}

/**
 * SUCCESS, FAILED, or SUCCESS with the number of failures let through by
 * continue-on-error
 */
function overallStatus(report: RunReport, counts: StatusCounts): string {
  if (!report.success) {
    return 'FAILED';
  }
  const tolerated = counts.failed + counts.errored;
  if (tolerated === 0) {
    return 'SUCCESS';
  }
  return `SUCCESS (${tolerated} tolerated ${tolerated === 1 ? 'failure' : 'failures'})`;
}

/**
 * Report for `--json`; the raw command result is left out since the outcome
 * already carries the output that was compared
 */
export function toJsonReport(report: RunReport): string {
  const outcomes = report.outcomes.map(({ result, ...outcome }) => ({
    ...outcome,
    exitCode: result?.exitCode,
    timedOut: result?.timedOut,
  }));
  return JSON.stringify({ ...report, outcomes, summary: summarize(report) }, null, 2);
}

function preview(text: string): string {
  const lines = text.split('\n');
  if (lines.length <= PREVIEW_LINES) {
    return lines.length === 1 ? text : `\n${indent(text)}`;
  }
  const shown = lines.slice(0, PREVIEW_LINES).join('\n');
  return `\n${indent(shown)}\n   ... (${lines.length - PREVIEW_LINES} more lines)`;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `     ${line}`)
    .join('\n');
}
