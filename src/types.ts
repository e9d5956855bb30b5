/** One configuration document to run and validate */
export interface ExampleSpec {
  /** Path exactly as given on the command line or in the list file */
  configPath: string;
  /** Base name of the config file's parent directory (e.g. "LidDrivenCavity") */
  name: string;
}

/** Where the validator looks for the snapshots a run writes */
export interface ArtifactLayout {
  /** Subdirectory of the output directory holding the manifest and cycles */
  manifestDir: string;
  /** Manifest file name inside manifestDir */
  manifestFile: string;
}

/**
 * Parallel launcher used to start the simulation
 * `null` on RunParameters means the staged executable runs directly.
 */
export interface LauncherSpec {
  command: string;
  /** Number of cooperating worker processes (passed as `-n`) */
  workers: number;
}

/** Process-wide run settings, fixed before the first example starts */
export interface RunParameters {
  /** Steps per example (N) */
  stepCount: number;
  /** Sandbox root: staged executable plus one working directory per example */
  workRoot: string;
  /** Root under which per-example output directories are created */
  outputRoot: string;
  /** Source executable, copied into workRoot before the loop */
  executablePath: string;
  /** File name of the staged copy inside workRoot */
  stagedExecutableName: string;
  launcher: LauncherSpec | null;
  /** Kill a run that takes longer than this; undefined waits forever */
  timeoutMs?: number;
  /** dt used when a config has neither dt nor final_time */
  defaultDt: number;
  artifacts: ArtifactLayout;
}

/** Raw outcome of running and validating one example */
export interface RunResult {
  example: ExampleSpec;
  exitCode: number;
  timedOut: boolean;
  /** Absolute paths of required artifacts that were not found, in check order */
  missingArtifacts: string[];
  outputDirectory: string;
  durationMs: number;
}

/** Why an example failed */
export type FailureReason =
  | { kind: "config-not-found"; path: string }
  | { kind: "malformed-config"; message: string }
  | { kind: "patch-write-failed"; message: string }
  | { kind: "exit-code"; exitCode: number }
  | { kind: "timed-out"; timeoutMs: number }
  | { kind: "missing-artifact"; path: string }
  | { kind: "error"; message: string };

/** Lifecycle of a single example before it reaches a terminal state */
export type ExamplePhase = "pending" | "patched" | "executed" | "validated";

/** Terminal state of one example */
export type ExampleOutcome =
  | { status: "succeeded"; example: ExampleSpec; result: RunResult }
  | {
      status: "failed";
      example: ExampleSpec;
      reasons: FailureReason[];
      /** Present when the example got as far as running */
      result?: RunResult;
    };

/** Aggregated pass/fail lists for a whole invocation */
export interface Summary {
  readonly total: number;
  readonly succeeded: readonly ExampleSpec[];
  readonly failed: readonly ExampleSpec[];
}
