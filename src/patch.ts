/**
 * Config Patcher
 *
 * Derives the configuration actually handed to the simulation from an
 * example's original config. The derivation is a pure function of
 * (original, stepCount, outputDirectory, defaultDt); loading and writing
 * are kept separate so the derivation can be tested on plain objects.
 */

import { MalformedConfigError, PatchWriteFailedError, errorMessage } from "./errors";
import { getPatchLogger } from "./logger";
import { safeParseSimulationConfig, type SimulationConfig } from "./schema";
import type { FileSystem } from "./system-environment";

/** dt used when a config specifies neither dt nor final_time */
export const DEFAULT_FALLBACK_DT = 1e-7;

/** File name of the patched config inside an example's working directory */
export const PATCHED_CONFIG_NAME = "config.patched.json";

/** Fields the harness writes into runTime; everything else passes through */
export interface HarnessRunTime {
  visualize: true;
  paraview: true;
  visit: false;
  nancheck: true;
  vis_steps: number;
  variable_dt: false;
  dt: number;
  final_time: number;
  initial_save_dt: number;
  output_file_path: string;
  checkpoint_load: false;
}

/** runTime block of a patched config */
export type PatchedRunTime = Record<string, unknown> & HarnessRunTime;

/** Patched config: the original's top-level fields with a rewritten runTime */
export type PatchedConfig = Record<string, unknown> & { runTime: PatchedRunTime };

export interface PatchOptions {
  /** Number of steps to run (N ≥ 1) */
  stepCount: number;
  /** Directory the simulation writes its output to */
  outputDirectory: string;
  /** dt when the config has neither dt nor final_time */
  defaultDt?: number;
}

/**
 * Snapshot cadence that emits both cycle 0 and cycle N
 * 10 when N is a multiple of 10, otherwise floor(N/2), never 0.
 */
export function computeVisSteps(stepCount: number): number {
  if (stepCount % 10 === 0) {
    return 10;
  }
  return Math.max(1, Math.floor(stepCount / 2));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Fixed step size for the patched run
 * Keeps an explicit dt, else spreads final_time over N steps, else falls back.
 */
export function deriveTimeStep(
  runTime: Record<string, unknown>,
  stepCount: number,
  defaultDt: number = DEFAULT_FALLBACK_DT
): number {
  if (isNumber(runTime.dt)) {
    return runTime.dt;
  }
  if (isNumber(runTime.final_time)) {
    return runTime.final_time / stepCount;
  }
  return defaultDt;
}

/**
 * Derive the patched config
 * Does not modify `original`.
 */
export function patchConfig(original: SimulationConfig, options: PatchOptions): PatchedConfig {
  const { stepCount, outputDirectory } = options;
  const runTime: Record<string, unknown> = original.runTime ?? {};

  const visSteps = computeVisSteps(stepCount);
  const dt = deriveTimeStep(runTime, stepCount, options.defaultDt);

  // Spread first so existing keys keep their position in the written JSON
  const patchedRunTime: PatchedRunTime = {
    ...runTime,
    visualize: true,
    paraview: true,
    visit: false,
    nancheck: true,
    vis_steps: visSteps,
    variable_dt: false,
    dt,
    final_time: dt * stepCount,
    initial_save_dt: dt * visSteps,
    output_file_path: outputDirectory,
    checkpoint_load: false,
  };

  return { ...original, runTime: patchedRunTime };
}

/**
 * Parse config text into a SimulationConfig
 * @throws MalformedConfigError if it is not JSON, not an object, or runTime is not an object
 */
export function parseSimulationConfig(content: string, source: string): SimulationConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new MalformedConfigError(`${source}: ${errorMessage(err)}`);
  }

  const validation = safeParseSimulationConfig(parsed);
  if (!validation.success || !isRecord(parsed)) {
    const errors = validation.errors ?? [];
    throw new MalformedConfigError(`${source}:\n  ${errors.join("\n  ")}`);
  }

  // Built from the parsed document, not validation.data: key order and
  // every top-level key must survive into the patched file
  const runTime = parsed.runTime;
  return { ...parsed, runTime: isRecord(runTime) ? runTime : null };
}

/**
 * Serialize a patched config the way it is written to disk
 */
export function serializeConfig(config: PatchedConfig): string {
  return JSON.stringify(config, null, 2) + "\n";
}

/**
 * Read an example config, patch it, and write the result
 *
 * @returns The patched config that was written
 * @throws MalformedConfigError if the config cannot be parsed
 * @throws PatchWriteFailedError if the patched config cannot be written
 */
export async function writePatchedConfig(
  fs: FileSystem,
  configPath: string,
  patchedPath: string,
  options: PatchOptions
): Promise<PatchedConfig> {
  const original = parseSimulationConfig(await fs.readText(configPath), configPath);
  const patched = patchConfig(original, options);

  try {
    await fs.write(patchedPath, serializeConfig(patched));
  } catch (err) {
    throw new PatchWriteFailedError(`${patchedPath}: ${errorMessage(err)}`);
  }

  getPatchLogger().debug(
    {
      configPath,
      patchedPath,
      dt: patched.runTime.dt,
      finalTime: patched.runTime.final_time,
      visSteps: patched.runTime.vis_steps,
    },
    "Patched config written"
  );

  return patched;
}
