import { describe, test, expect } from "vitest";
import {
  classifyResult,
  createSummary,
  describeReason,
  formatJUnitReport,
  formatOutcome,
  formatSummary,
  recordOutcome,
  summaryExitCode,
} from "./report";
import type { ExampleOutcome, ExampleSpec, RunResult } from "./types";

const exampleA: ExampleSpec = { configPath: "cases/A/config.json", name: "A" };
const exampleB: ExampleSpec = { configPath: "cases/B/config.json", name: "B" };

function runResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    example: exampleA,
    exitCode: 0,
    timedOut: false,
    missingArtifacts: [],
    outputDirectory: "/run/A/out",
    durationMs: 1500,
    ...overrides,
  };
}

describe("classifyResult", () => {
  test("succeeds with exit 0 and all artifacts", () => {
    const outcome = classifyResult(runResult());
    expect(outcome.status).toBe("succeeded");
  });

  test("fails on a non-zero exit", () => {
    const outcome = classifyResult(runResult({ exitCode: 1 }));
    expect(outcome).toMatchObject({
      status: "failed",
      reasons: [{ kind: "exit-code", exitCode: 1 }],
    });
  });

  test("fails on missing artifacts even when the exit code is 0", () => {
    const outcome = classifyResult(runResult({ missingArtifacts: ["/run/A/out/ParaView/ParaView.pvd"] }));
    expect(outcome).toMatchObject({
      status: "failed",
      reasons: [{ kind: "missing-artifact", path: "/run/A/out/ParaView/ParaView.pvd" }],
    });
  });

  test("lists timeout, exit code and missing artifacts in that order", () => {
    const outcome = classifyResult(
      runResult({ timedOut: true, exitCode: 124, missingArtifacts: ["/x", "/y"] }),
      30000
    );
    expect(outcome.status === "failed" ? outcome.reasons : []).toEqual([
      { kind: "timed-out", timeoutMs: 30000 },
      { kind: "exit-code", exitCode: 124 },
      { kind: "missing-artifact", path: "/x" },
      { kind: "missing-artifact", path: "/y" },
    ]);
  });
});

describe("summary", () => {
  test("records outcomes without modifying the previous summary", () => {
    const empty = createSummary(2);
    const afterA = recordOutcome(empty, classifyResult(runResult()));
    const afterB = recordOutcome(afterA, {
      status: "failed",
      example: exampleB,
      reasons: [{ kind: "config-not-found", path: exampleB.configPath }],
    });

    expect(empty).toEqual({ total: 2, succeeded: [], failed: [] });
    expect(afterB).toEqual({ total: 2, succeeded: [exampleA], failed: [exampleB] });
  });

  test("exit code is 0 only when nothing failed", () => {
    expect(summaryExitCode({ total: 1, succeeded: [exampleA], failed: [] })).toBe(0);
    expect(summaryExitCode({ total: 2, succeeded: [exampleA], failed: [exampleB] })).toBe(1);
  });
});

describe("describeReason", () => {
  test("covers every kind", () => {
    expect(describeReason({ kind: "config-not-found", path: "a/config.json" })).toBe(
      "config not found: a/config.json"
    );
    expect(describeReason({ kind: "malformed-config", message: "bad" })).toBe("malformed config: bad");
    expect(describeReason({ kind: "patch-write-failed", message: "EACCES" })).toBe(
      "cannot write patched config: EACCES"
    );
    expect(describeReason({ kind: "exit-code", exitCode: 139 })).toBe("runtime exit code: 139");
    expect(describeReason({ kind: "timed-out", timeoutMs: 90000 })).toBe("timed out after 90s");
    expect(describeReason({ kind: "missing-artifact", path: "/o/x" })).toBe("missing: /o/x");
    expect(describeReason({ kind: "error", message: "boom" })).toBe("error: boom");
  });
});

describe("formatOutcome", () => {
  test("one line for a success", () => {
    expect(formatOutcome(classifyResult(runResult()))).toEqual(["✓ Example OK: A (outputs in /run/A/out)"]);
  });

  test("a header and one line per reason for a failure", () => {
    const outcome = classifyResult(runResult({ exitCode: 2, missingArtifacts: ["/run/A/out/ParaView/ParaView.pvd"] }));
    expect(formatOutcome(outcome)).toEqual([
      "✗ Example FAILED: A",
      "  - runtime exit code: 2",
      "  - missing: /run/A/out/ParaView/ParaView.pvd",
    ]);
  });
});

describe("formatSummary", () => {
  test("prints counts then the passed and failed configs", () => {
    expect(formatSummary({ total: 2, succeeded: [exampleA], failed: [exampleB] })).toEqual([
      "",
      "===== Example Summary =====",
      "Total: 2 | Succeeded: 1 | Failed: 1",
      "  ✓ cases/A/config.json",
      "  ✗ cases/B/config.json",
    ]);
  });
});

describe("formatJUnitReport", () => {
  test("writes one testcase per example", () => {
    const outcomes: ExampleOutcome[] = [
      classifyResult(runResult()),
      {
        status: "failed",
        example: { configPath: "cases/<B>/config.json", name: "<B>" },
        reasons: [
          { kind: "exit-code", exitCode: 1 },
          { kind: "missing-artifact", path: "/run/B/out/ParaView/ParaView.pvd" },
        ],
      },
    ];

    expect(formatJUnitReport(outcomes)).toBe(
      `<?xml version="1.0" encoding="UTF-8"?>
<testsuites tests="2" failures="1">
  <testsuite name="simcheck" tests="2" failures="1" time="1.500">
    <testcase name="cases/A/config.json" classname="A" time="1.500"/>
    <testcase name="cases/&lt;B&gt;/config.json" classname="&lt;B&gt;" time="0.000">
      <failure message="runtime exit code: 1">runtime exit code: 1
missing: /run/B/out/ParaView/ParaView.pvd</failure>
    </testcase>
  </testsuite>
</testsuites>
`
    );
  });
});
