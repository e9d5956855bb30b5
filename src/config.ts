/**
 * Harness settings
 * Loads optional settings files and merges them with CLI flags into RunParameters.
 *
 * This module uses pure functions without module-level state.
 *
 * ============================================================================
 * SETTINGS PRECEDENCE (later entries override earlier ones)
 * ============================================================================
 *
 * 1. Built-in defaults (BUILTIN_SETTINGS)
 * 2. Git root settings file (simcheck.config.yaml, .simcheck.yaml or .simcheck.json)
 * 3. CWD settings file (same names)
 * 4. CLI flags
 *
 * Example:
 *   Built-in: { stepCount: 100, launcher: "mpiexec" }
 *   + Git root: { stepCount: 20 }
 *   + CWD: { launcher: "mpirun" }
 *   + CLI: -n 40
 *   = Final: { stepCount: 40, launcher: "mpirun" }
 *
 * ============================================================================
 */

import { dirname, join, resolve } from "node:path";
import yaml from "js-yaml";
import type { CliArgs } from "./cli";
import { DEFAULT_LAUNCHER, DEFAULT_WORKERS, NO_LAUNCHER } from "./command";
import { ConfigurationError, UsageError, errorMessage } from "./errors";
import { DEFAULT_FALLBACK_DT } from "./patch";
import { safeParseSettings, type Settings } from "./schema";
import type { FileSystem } from "./system-environment";
import type { RunParameters } from "./types";
import { DEFAULT_ARTIFACT_LAYOUT } from "./validate";

export type { Settings } from "./schema";

/** Settings file names (checked in order) */
export const SETTINGS_FILE_NAMES = ["simcheck.config.yaml", ".simcheck.yaml", ".simcheck.json"];

/** Steps per example when neither -n nor a settings file says otherwise */
export const DEFAULT_STEP_COUNT = 100;

/** Default executable file name inside the build directory */
export const DEFAULT_EXECUTABLE_NAME = "Prandtl";

/**
 * Built-in defaults (used when no settings file exists)
 */
export const BUILTIN_SETTINGS = {
  stepCount: DEFAULT_STEP_COUNT,
  buildDir: "build",
  executableName: DEFAULT_EXECUTABLE_NAME,
  runDir: "RunTests",
  launcher: DEFAULT_LAUNCHER,
  workers: DEFAULT_WORKERS,
  timeoutSeconds: 0,
  defaultDt: DEFAULT_FALLBACK_DT,
  manifestDir: DEFAULT_ARTIFACT_LAYOUT.manifestDir,
  manifestFile: DEFAULT_ARTIFACT_LAYOUT.manifestFile,
} satisfies Settings;

/**
 * Find the git root directory starting from a given path
 * Walks up the directory tree looking for .git
 * @returns The git root path, or null if not in a git repo
 */
export async function findGitRoot(fs: FileSystem, startPath: string): Promise<string | null> {
  let current = resolve(startPath);
  let previous = "";

  // Walk up until we hit the filesystem root (when dirname returns the same path)
  while (current !== previous) {
    // .git is a directory in a normal repo and a file in a worktree
    if (await fs.exists(join(current, ".git"))) {
      return current;
    }
    previous = current;
    current = dirname(current);
  }

  return null;
}

/**
 * Find a settings file in a directory
 * @returns The file path if found, null otherwise
 */
async function findSettingsFile(fs: FileSystem, dir: string): Promise<string | null> {
  for (const name of SETTINGS_FILE_NAMES) {
    const candidate = join(dir, name);
    if (await fs.exists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load and validate a settings file (yaml or json)
 * @throws ConfigurationError if the file cannot be parsed or fails validation
 */
export async function loadSettingsFile(fs: FileSystem, filePath: string): Promise<Settings> {
  let parsed: unknown;
  try {
    const content = await fs.readText(filePath);
    parsed = filePath.endsWith(".json") ? JSON.parse(content) : yaml.load(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid settings file ${filePath}: ${errorMessage(err)}`);
  }

  // An empty YAML file loads as undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }

  const validation = safeParseSettings(parsed);
  if (!validation.success || !validation.data) {
    const errors = validation.errors ?? [];
    throw new ConfigurationError(`Invalid settings file ${filePath}:\n  ${errors.join("\n  ")}`);
  }
  return validation.data;
}

/**
 * Merge two settings objects (second takes priority)
 * Returns a new object - does not modify either input.
 */
export function mergeSettings(base: Settings, override: Settings): Settings {
  const result: Settings = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Load settings with cascade: git root → CWD
 * Returns merged settings from both locations (CWD takes priority)
 */
export async function loadProjectSettings(fs: FileSystem, cwd: string): Promise<Settings> {
  const resolvedCwd = resolve(cwd);
  let settings: Settings = {};

  // 1. Load from git root (if different from CWD)
  const gitRoot = await findGitRoot(fs, resolvedCwd);
  if (gitRoot && gitRoot !== resolvedCwd) {
    const gitRootFile = await findSettingsFile(fs, gitRoot);
    if (gitRootFile) {
      settings = await loadSettingsFile(fs, gitRootFile);
    }
  }

  // 2. Load from CWD (overrides git root)
  const cwdFile = await findSettingsFile(fs, resolvedCwd);
  if (cwdFile) {
    settings = mergeSettings(settings, await loadSettingsFile(fs, cwdFile));
  }

  return settings;
}

/**
 * Combine built-in defaults, settings files and CLI flags into RunParameters
 *
 * @throws UsageError if the combined values are out of range
 */
export function resolveRunParameters(
  cli: CliArgs,
  settings: Settings,
  cwd: string = process.cwd()
): RunParameters {
  const merged = mergeSettings(mergeSettings(BUILTIN_SETTINGS, settings), {
    stepCount: cli.stepCount,
    buildDir: cli.buildDir,
    executable: cli.executable,
    runDir: cli.runDir,
    launcher: cli.launcher,
    workers: cli.workers,
    timeoutSeconds: cli.timeoutSeconds,
    defaultDt: cli.defaultDt,
    manifestDir: cli.manifestDir,
    manifestFile: cli.manifestFile,
  });

  const rawSteps = merged.stepCount ?? DEFAULT_STEP_COUNT;
  // 0 means "use the default"
  const stepCount = rawSteps === 0 ? DEFAULT_STEP_COUNT : rawSteps;
  if (!Number.isInteger(stepCount) || stepCount < 1) {
    throw new UsageError(`step count must be a positive integer, got ${rawSteps}`);
  }

  const executableName = merged.executableName ?? DEFAULT_EXECUTABLE_NAME;
  const buildDir = resolve(cwd, merged.buildDir ?? BUILTIN_SETTINGS.buildDir);
  const executablePath = resolve(cwd, merged.executable ?? join(buildDir, executableName));
  const workRoot = resolve(cwd, merged.runDir ?? BUILTIN_SETTINGS.runDir);

  const launcherCommand = merged.launcher ?? DEFAULT_LAUNCHER;
  const workers = merged.workers ?? DEFAULT_WORKERS;
  const timeoutSeconds = merged.timeoutSeconds ?? 0;

  return {
    stepCount,
    workRoot,
    outputRoot: workRoot,
    executablePath,
    stagedExecutableName: executableName,
    launcher: launcherCommand === NO_LAUNCHER ? null : { command: launcherCommand, workers },
    timeoutMs: timeoutSeconds > 0 ? Math.round(timeoutSeconds * 1000) : undefined,
    defaultDt: merged.defaultDt ?? DEFAULT_FALLBACK_DT,
    artifacts: {
      manifestDir: merged.manifestDir ?? DEFAULT_ARTIFACT_LAYOUT.manifestDir,
      manifestFile: merged.manifestFile ?? DEFAULT_ARTIFACT_LAYOUT.manifestFile,
    },
  };
}
