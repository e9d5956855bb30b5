/**
 * Sandbox Preparer
 *
 * The run directory holds a private copy of the simulation executable plus
 * one working directory per example:
 *
 *   <workRoot>/
 *     Prandtl                      staged executable
 *     LidDrivenCavity/
 *       config.patched.json
 *       out/                       output_file_path of the patched config
 */

import { join } from "node:path";
import { ExecutableNotFoundError, SandboxCreateFailedError, errorMessage } from "./errors";
import { getSandboxLogger } from "./logger";
import { PATCHED_CONFIG_NAME } from "./patch";
import type { FileSystem } from "./system-environment";
import type { ExampleSpec, RunParameters } from "./types";

/** Output directory name inside each example's working directory */
export const OUTPUT_DIR_NAME = "out";

/** Paths used by one example's run */
export interface WorkArea {
  /** Working directory the simulation runs in */
  workDir: string;
  /** Directory the simulation writes snapshots to */
  outputDirectory: string;
  /** Patched config location */
  patchedConfigPath: string;
}

/**
 * Where the staged executable lives
 */
export function stagedExecutablePath(params: Pick<RunParameters, "workRoot" | "stagedExecutableName">): string {
  return join(params.workRoot, params.stagedExecutableName);
}

/**
 * Compute an example's work area without touching the file system
 */
export function workAreaFor(example: ExampleSpec, outputRoot: string): WorkArea {
  const workDir = join(outputRoot, example.name);
  return {
    workDir,
    outputDirectory: join(workDir, OUTPUT_DIR_NAME),
    patchedConfigPath: join(workDir, PATCHED_CONFIG_NAME),
  };
}

/**
 * Check that the source executable exists and can be run
 * @throws ExecutableNotFoundError
 */
export async function assertExecutable(fs: FileSystem, executablePath: string): Promise<void> {
  const info = await fs.info(executablePath);
  if (!info || !info.isFile) {
    throw new ExecutableNotFoundError(`simulation executable not found at ${executablePath}`);
  }
  if (!info.executable) {
    throw new ExecutableNotFoundError(`simulation executable is not executable: ${executablePath}`);
  }
}

/**
 * Create the run directory and stage the executable into it
 *
 * @returns Path of the staged copy
 * @throws ExecutableNotFoundError if the source executable is missing or not executable
 * @throws SandboxCreateFailedError on file system errors
 */
export async function prepareSandbox(
  fs: FileSystem,
  params: Pick<RunParameters, "workRoot" | "executablePath" | "stagedExecutableName">
): Promise<string> {
  await assertExecutable(fs, params.executablePath);

  const staged = stagedExecutablePath(params);
  try {
    await fs.mkdir(params.workRoot);
    await fs.copyExecutable(params.executablePath, staged);
  } catch (err) {
    throw new SandboxCreateFailedError(
      `cannot prepare run directory ${params.workRoot}: ${errorMessage(err)}`
    );
  }

  getSandboxLogger().info({ workRoot: params.workRoot, staged }, "Executable staged");
  return staged;
}

/**
 * Purge and recreate an example's working directory
 * Nothing from a previous invocation survives, including old checkpoints.
 */
export async function prepareWorkArea(fs: FileSystem, area: WorkArea): Promise<void> {
  await fs.remove(area.workDir);
  await fs.mkdir(area.workDir);
  await fs.mkdir(area.outputDirectory);
  getSandboxLogger().debug({ workDir: area.workDir }, "Work area recreated");
}
