import { DEFAULT_EXECUTABLE_NAME, DEFAULT_STEP_COUNT, SETTINGS_FILE_NAMES } from "./config";
import { DEFAULT_LAUNCHER, DEFAULT_WORKERS, NO_LAUNCHER } from "./command";
import { EarlyExitRequest, UsageError } from "./errors";
import { DEFAULT_FALLBACK_DT } from "./patch";
import { DEFAULT_ARTIFACT_LAYOUT } from "./validate";

/**
 * Parsed command line
 * Every value is optional so settings files can fill the gaps.
 */
export interface CliArgs {
  stepCount?: number;
  buildDir?: string;
  executable?: string;
  runDir?: string;
  configPath?: string;
  listPath?: string;
  launcher?: string;
  workers?: number;
  timeoutSeconds?: number;
  defaultDt?: number;
  manifestDir?: string;
  manifestFile?: string;
  junitPath?: string;
  help: boolean;
}

type ValueOption = Exclude<keyof CliArgs, "help">;

/** Options that take a value, by flag */
const VALUE_OPTIONS: Record<string, ValueOption> = {
  "-n": "stepCount",
  "-b": "buildDir",
  "-e": "executable",
  "-o": "runDir",
  "-c": "configPath",
  "-l": "listPath",
  "--launcher": "launcher",
  "--workers": "workers",
  "--timeout": "timeoutSeconds",
  "--default-dt": "defaultDt",
  "--manifest-dir": "manifestDir",
  "--manifest-file": "manifestFile",
  "--junit": "junitPath",
};

function parseCount(flag: string, raw: string, min: number): number {
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`Option ${flag} expects a whole number, got '${raw}'.`);
  }
  const value = Number(raw);
  if (value < min) {
    throw new UsageError(`Option ${flag} must be at least ${min}, got ${value}.`);
  }
  return value;
}

function parseNumber(flag: string, raw: string, options: { positive: boolean }): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new UsageError(`Option ${flag} expects a number, got '${raw}'.`);
  }
  if (options.positive ? value <= 0 : value < 0) {
    throw new UsageError(`Option ${flag} must be ${options.positive ? "positive" : "non-negative"}, got ${value}.`);
  }
  return value;
}

/**
 * Store one option value on the result, converting numbers
 */
function applyOption(result: CliArgs, flag: string, key: ValueOption, raw: string): void {
  switch (key) {
    case "stepCount":
      result.stepCount = parseCount(flag, raw, 0);
      return;
    case "workers":
      result.workers = parseCount(flag, raw, 1);
      return;
    case "timeoutSeconds":
      result.timeoutSeconds = parseNumber(flag, raw, { positive: false });
      return;
    case "defaultDt":
      result.defaultDt = parseNumber(flag, raw, { positive: true });
      return;
    default:
      result[key] = raw;
  }
}

/**
 * Parse CLI arguments
 *
 * Short options follow getopts conventions: `-n 50` or `-n50`.
 * Long options take `--flag value` or `--flag=value`.
 *
 * @throws UsageError on unknown options, missing values or stray arguments
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const result: CliArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      continue;
    }

    let flag = arg;
    let inlineValue: string | undefined;
    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      flag = arg.slice(0, eq);
      inlineValue = arg.slice(eq + 1);
    } else if (/^-[a-z].+/.test(arg)) {
      // getopts-style attached value: -n50
      flag = arg.slice(0, 2);
      inlineValue = arg.slice(2);
    }

    const key = VALUE_OPTIONS[flag];
    if (!key) {
      if (arg.startsWith("-")) {
        throw new UsageError(`Unknown option ${flag}`);
      }
      throw new UsageError(`Unexpected argument '${arg}'`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined) {
        throw new UsageError(`Option ${flag} requires an argument.`);
      }
      value = next;
      i++;
    }

    applyOption(result, flag, key, value);
  }

  return result;
}

/**
 * Usage text
 */
export function usage(program: string = "simcheck"): string {
  return `
Usage: ${program} [-n STEPS] [-b BUILDDIR] [-e EXECUTABLE] [-o RUNDIR] (-c CONFIG.json | -l LIST.txt)

  -n STEPS      Number of steps to run (default: ${DEFAULT_STEP_COUNT}; 0 also means the default)
  -b BUILDDIR   Build directory (default: ./build)
  -e EXECUTABLE Path to the simulation executable (default: BUILDDIR/${DEFAULT_EXECUTABLE_NAME})
  -o RUNDIR     Directory to run in (default: ./RunTests)
  -c CONFIG     Single example config.json to run
  -l LIST       List file with one config.json path per line (comments (#) allowed)

Run options:
  --launcher CMD        Parallel launcher (default: ${DEFAULT_LAUNCHER}; '${NO_LAUNCHER}' runs the executable directly)
  --workers N           Worker processes passed to the launcher as -n (default: ${DEFAULT_WORKERS})
  --timeout SECONDS     Kill a run after this long (default: no timeout)
  --default-dt DT       dt for configs with neither dt nor final_time (default: ${DEFAULT_FALLBACK_DT})
  --manifest-dir NAME   Output subdirectory holding snapshots (default: ${DEFAULT_ARTIFACT_LAYOUT.manifestDir})
  --manifest-file NAME  Manifest file name (default: ${DEFAULT_ARTIFACT_LAYOUT.manifestFile})
  --junit PATH          Also write a JUnit XML report
  -h, --help            Show this help

Settings files (${SETTINGS_FILE_NAMES.join(", ")}) in the git root and the
current directory supply defaults for all of the above; flags win.

Exit codes:
  0  all examples succeeded
  1  one or more examples failed
  2  usage or dependency error

Examples:
  ${program} -c TestCases/NavierStokes/2D/LidDrivenCavity/config.json
  ${program} -l examples.txt -n 20 --timeout 600
`;
}

/**
 * Handle --help
 * @throws EarlyExitRequest after printing usage
 */
export function handleHelp(args: CliArgs, print: (text: string) => void): void {
  if (args.help) {
    print(usage());
    throw new EarlyExitRequest();
  }
}
