/**
 * Result Aggregator / Reporter
 *
 * Classifies each example's run, folds the outcomes into a Summary, and
 * formats the progress lines, the final summary and the JUnit report.
 */

import type { ExampleOutcome, ExampleSpec, FailureReason, RunResult, Summary } from "./types";

/** Exit code when every example passed */
export const EXIT_ALL_PASSED = 0;

/** Exit code when at least one example failed */
export const EXIT_SOME_FAILED = 1;

/**
 * Decide the terminal state of an example that ran
 * Success needs exit status 0, no timeout, and every artifact present.
 */
export function classifyResult(result: RunResult, timeoutMs?: number): ExampleOutcome {
  const reasons: FailureReason[] = [];

  if (result.timedOut) {
    reasons.push({ kind: "timed-out", timeoutMs: timeoutMs ?? 0 });
  }
  if (result.exitCode !== 0) {
    reasons.push({ kind: "exit-code", exitCode: result.exitCode });
  }
  for (const path of result.missingArtifacts) {
    reasons.push({ kind: "missing-artifact", path });
  }

  if (reasons.length === 0) {
    return { status: "succeeded", example: result.example, result };
  }
  return { status: "failed", example: result.example, reasons, result };
}

/**
 * Summary before any example has finished
 */
export function createSummary(total: number): Summary {
  return { total, succeeded: [], failed: [] };
}

/**
 * Add one outcome to a summary, returning a new summary
 */
export function recordOutcome(summary: Summary, outcome: ExampleOutcome): Summary {
  if (outcome.status === "succeeded") {
    return { ...summary, succeeded: [...summary.succeeded, outcome.example] };
  }
  return { ...summary, failed: [...summary.failed, outcome.example] };
}

/**
 * Process exit code for a finished run
 */
export function summaryExitCode(summary: Summary): number {
  return summary.failed.length > 0 ? EXIT_SOME_FAILED : EXIT_ALL_PASSED;
}

/**
 * One-line description of a failure reason
 */
export function describeReason(reason: FailureReason): string {
  switch (reason.kind) {
    case "config-not-found":
      return `config not found: ${reason.path}`;
    case "malformed-config":
      return `malformed config: ${reason.message}`;
    case "patch-write-failed":
      return `cannot write patched config: ${reason.message}`;
    case "exit-code":
      return `runtime exit code: ${reason.exitCode}`;
    case "timed-out":
      return `timed out after ${reason.timeoutMs / 1000}s`;
    case "missing-artifact":
      return `missing: ${reason.path}`;
    case "error":
      return `error: ${reason.message}`;
  }
}

/**
 * Progress lines printed when an example finishes
 */
export function formatOutcome(outcome: ExampleOutcome): string[] {
  if (outcome.status === "succeeded") {
    return [`✓ Example OK: ${outcome.example.name} (outputs in ${outcome.result.outputDirectory})`];
  }
  return [
    `✗ Example FAILED: ${outcome.example.name}`,
    ...outcome.reasons.map(reason => `  - ${describeReason(reason)}`),
  ];
}

/**
 * Final summary block
 */
export function formatSummary(summary: Summary): string[] {
  return [
    "",
    "===== Example Summary =====",
    `Total: ${summary.total} | Succeeded: ${summary.succeeded.length} | Failed: ${summary.failed.length}`,
    ...summary.succeeded.map(example => `  ✓ ${example.configPath}`),
    ...summary.failed.map(example => `  ✗ ${example.configPath}`),
  ];
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function exampleTime(outcome: ExampleOutcome): number {
  return (outcome.result?.durationMs ?? 0) / 1000;
}

/**
 * Format outcomes as a JUnit XML report
 * One <testcase> per example, named after the config path.
 */
export function formatJUnitReport(outcomes: ExampleOutcome[], suiteName: string = "simcheck"): string {
  const failures = outcomes.filter(o => o.status === "failed").length;
  const totalTime = outcomes.reduce((sum, o) => sum + exampleTime(o), 0);

  const cases = outcomes.map(outcome => {
    const attrs =
      `name="${escapeXml(outcome.example.configPath)}" ` +
      `classname="${escapeXml(outcome.example.name)}" ` +
      `time="${exampleTime(outcome).toFixed(3)}"`;

    if (outcome.status === "succeeded") {
      return `    <testcase ${attrs}/>`;
    }

    const details = outcome.reasons.map(describeReason);
    const message = details[0] ?? "failed";
    return `    <testcase ${attrs}>
      <failure message="${escapeXml(message)}">${escapeXml(details.join("\n"))}</failure>
    </testcase>`;
  });

  return `<?xml version="1.0" encoding="UTF-8"?>
<testsuites tests="${outcomes.length}" failures="${failures}">
  <testsuite name="${escapeXml(suiteName)}" tests="${outcomes.length}" failures="${failures}" time="${totalTime.toFixed(3)}">
${cases.join("\n")}
  </testsuite>
</testsuites>
`;
}
