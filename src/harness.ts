/**
 * Example loop
 *
 * Runs examples strictly one after another. Each example is
 * patch → run → validate inside its own failure boundary: whatever goes wrong
 * becomes a failed outcome and the loop moves on to the next example.
 */

import { resolve } from "node:path";
import { runSimulation } from "./command";
import { ConfigNotFoundError, MalformedConfigError, PatchWriteFailedError, errorMessage } from "./errors";
import { getReportLogger, getRunLogger } from "./logger";
import { writePatchedConfig } from "./patch";
import { classifyResult, createSummary, formatOutcome, recordOutcome } from "./report";
import { prepareWorkArea, workAreaFor } from "./sandbox";
import type { SystemEnvironment } from "./system-environment";
import type { ExampleOutcome, ExamplePhase, ExampleSpec, FailureReason, RunParameters, Summary } from "./types";
import type { UserInterface } from "./ui";
import { findMissingArtifacts } from "./validate";

export interface HarnessDeps {
  env: SystemEnvironment;
  ui: UserInterface;
  /** Directory relative config paths resolve against */
  cwd?: string;
}

/** Everything a finished invocation produced */
export interface HarnessRun {
  summary: Summary;
  outcomes: ExampleOutcome[];
}

/**
 * Convert an error raised inside an example into a failure reason
 */
export function failureReasonFor(err: unknown): FailureReason {
  if (err instanceof ConfigNotFoundError) {
    return { kind: "config-not-found", path: err.path };
  }
  if (err instanceof MalformedConfigError) {
    return { kind: "malformed-config", message: err.message };
  }
  if (err instanceof PatchWriteFailedError) {
    return { kind: "patch-write-failed", message: err.message };
  }
  return { kind: "error", message: errorMessage(err) };
}

/**
 * Patch, run and validate one example
 * Errors propagate; runExample() turns them into a failed outcome.
 */
async function executeExample(
  example: ExampleSpec,
  params: RunParameters,
  deps: HarnessDeps,
  advance: (phase: ExamplePhase) => void
): Promise<ExampleOutcome> {
  const { fs, shell } = deps.env;
  const configPath = resolve(deps.cwd ?? process.cwd(), example.configPath);

  const configInfo = await fs.info(configPath);
  if (!configInfo?.isFile) {
    throw new ConfigNotFoundError(example.configPath);
  }

  const area = workAreaFor(example, params.outputRoot);
  await prepareWorkArea(fs, area);

  await writePatchedConfig(fs, configPath, area.patchedConfigPath, {
    stepCount: params.stepCount,
    outputDirectory: area.outputDirectory,
    defaultDt: params.defaultDt,
  });
  advance("patched");

  const execution = await runSimulation(shell, params, area);
  advance("executed");

  const missingArtifacts = await findMissingArtifacts(
    fs,
    area.outputDirectory,
    params.stepCount,
    params.artifacts
  );
  advance("validated");

  return classifyResult(
    {
      example,
      exitCode: execution.exitCode,
      timedOut: execution.timedOut,
      missingArtifacts,
      outputDirectory: area.outputDirectory,
      durationMs: execution.durationMs,
    },
    params.timeoutMs
  );
}

/**
 * Run one example to a terminal state
 * Never throws.
 */
export async function runExample(
  example: ExampleSpec,
  params: RunParameters,
  deps: HarnessDeps
): Promise<ExampleOutcome> {
  const logger = getRunLogger().child({ example: example.name });
  let phase: ExamplePhase = "pending";
  const advance = (next: ExamplePhase) => {
    phase = next;
    logger.debug({ phase }, "Example phase");
  };

  deps.ui.log(`==> Running example: ${example.configPath}`);
  deps.ui.log(`    Working dir: ${params.workRoot}`);

  let outcome: ExampleOutcome;
  try {
    outcome = await executeExample(example, params, deps, advance);
  } catch (err) {
    logger.error({ phase, error: errorMessage(err) }, "Example aborted");
    outcome = { status: "failed", example, reasons: [failureReasonFor(err)] };
  }

  logger.info({ status: outcome.status, phase }, "Example finished");
  for (const line of formatOutcome(outcome)) {
    deps.ui.log(line);
  }
  return outcome;
}

/**
 * Run every example in order and aggregate the results
 */
export async function runExamples(
  examples: ExampleSpec[],
  params: RunParameters,
  deps: HarnessDeps
): Promise<HarnessRun> {
  let summary = createSummary(examples.length);
  const outcomes: ExampleOutcome[] = [];

  for (const example of examples) {
    const outcome = await runExample(example, params, deps);
    outcomes.push(outcome);
    summary = recordOutcome(summary, outcome);
  }

  getReportLogger().info(
    { total: summary.total, succeeded: summary.succeeded.length, failed: summary.failed.length },
    "All examples finished"
  );

  return { summary, outcomes };
}
