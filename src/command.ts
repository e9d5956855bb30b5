/**
 * Run Executor - launch the staged simulation for one example
 *
 *   cd <workDir> && mpiexec -n 2 ../Prandtl -c <workDir>/config.patched.json
 *
 * The simulation is an opaque blocking unit of work: the harness waits for
 * the launcher to exit and records the status. One attempt, no retry.
 */

import { getRunLogger } from "./logger";
import type { Shell } from "./system-environment";
import type { RunParameters } from "./types";
import type { WorkArea } from "./sandbox";

/** Default parallel launcher */
export const DEFAULT_LAUNCHER = "mpiexec";

/** Default number of cooperating worker processes */
export const DEFAULT_WORKERS = 2;

/** Launcher value that runs the executable without a parallel launcher */
export const NO_LAUNCHER = "none";

/** A resolved command line */
export interface LaunchCommand {
  command: string;
  args: string[];
}

/** Exit status of one simulation run */
export interface ExecutionResult {
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Controller for the in-flight run
 * Used for graceful signal handling (SIGINT/SIGTERM cleanup)
 */
let currentRun: AbortController | null = null;

/**
 * Kill the current simulation if one is running
 * Returns true if a run was signalled, false otherwise
 */
export function killCurrentChildProcess(): boolean {
  if (currentRun && !currentRun.signal.aborted) {
    currentRun.abort();
    return true;
  }
  return false;
}

/**
 * Build the command line for one run
 * The executable path is relative because the run's cwd is one level below the sandbox root.
 */
export function buildLaunchCommand(
  params: Pick<RunParameters, "launcher" | "stagedExecutableName">,
  patchedConfigPath: string
): LaunchCommand {
  const executable = `../${params.stagedExecutableName}`;
  const simulationArgs = ["-c", patchedConfigPath];

  if (!params.launcher) {
    return { command: executable, args: simulationArgs };
  }

  return {
    command: params.launcher.command,
    args: ["-n", String(params.launcher.workers), executable, ...simulationArgs],
  };
}

/**
 * Run the simulation for one example and wait for it to finish
 * Never throws for a failing run: the status is returned for the caller to classify.
 */
export async function runSimulation(
  shell: Shell,
  params: Pick<RunParameters, "launcher" | "stagedExecutableName" | "timeoutMs">,
  area: WorkArea
): Promise<ExecutionResult> {
  const { command, args } = buildLaunchCommand(params, area.patchedConfigPath);
  const logger = getRunLogger();
  logger.info({ command, args, cwd: area.workDir, timeoutMs: params.timeoutMs }, "Launching simulation");

  const controller = new AbortController();
  currentRun = controller;
  const startTime = Date.now();

  try {
    const result = await shell.execute(command, args, {
      cwd: area.workDir,
      stdout: "inherit",
      stderr: "inherit",
      timeoutMs: params.timeoutMs,
      signal: controller.signal,
    });

    const durationMs = Date.now() - startTime;
    logger.info({ exitCode: result.exitCode, timedOut: result.timedOut, durationMs }, "Simulation finished");

    return { exitCode: result.exitCode, timedOut: result.timedOut, durationMs };
  } finally {
    currentRun = null;
  }
}
