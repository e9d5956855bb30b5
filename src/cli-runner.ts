/**
 * CliRunner - Testable entry point for the simcheck CLI
 *
 * Encapsulates all orchestration logic from main(), accepting a
 * SystemEnvironment and a UserInterface for dependency injection. This
 * enables testing the whole flow without spawning a simulation or touching
 * the real filesystem.
 *
 * Setup errors (usage, settings, missing launcher or executable) end the run
 * with exit code 2 before any example starts. Per-example failures never do.
 */

import { resolve } from "node:path";
import { handleHelp, parseCliArgs, usage } from "./cli";
import { loadProjectSettings, resolveRunParameters } from "./config";
import { DependencyMissingError, EXIT_USAGE, HarnessError, UsageError, errorMessage } from "./errors";
import { resolveExampleSet } from "./examples";
import { runExamples } from "./harness";
import { getCurrentLogPath, getLogger, initLogger } from "./logger";
import { formatJUnitReport, formatSummary, summaryExitCode } from "./report";
import { prepareSandbox } from "./sandbox";
import type { SystemEnvironment } from "./system-environment";
import type { RunParameters, Summary } from "./types";
import type { UserInterface } from "./ui";

/** Result from CliRunner.run() */
export interface CliRunResult {
  exitCode: number;
  errorMessage?: string;
  logPath?: string | null;
  /** Present when the example loop ran */
  summary?: Summary;
}

/** Options for CliRunner */
export interface CliRunnerOptions {
  env: SystemEnvironment;
  ui: UserInterface;
  cwd?: string;
  /** Write the debug log under ~/.simcheck/logs (default: true) */
  fileLogging?: boolean;
}

/** CliRunner - Main orchestrator for the simcheck CLI */
export class CliRunner {
  private env: SystemEnvironment;
  private ui: UserInterface;
  private cwd: string;
  private fileLogging: boolean;

  constructor(options: CliRunnerOptions) {
    this.env = options.env;
    this.ui = options.ui;
    this.cwd = options.cwd ?? process.cwd();
    this.fileLogging = options.fileLogging ?? true;
  }

  private printErrorWithLogPath(message: string, logPath: string | null): void {
    this.ui.error(`ERROR: ${message}`);
    if (logPath) this.ui.error(`   Detailed logs: ${logPath}`);
  }

  /**
   * Make sure the parallel launcher can be found before any example runs
   * @throws DependencyMissingError
   */
  private async checkLauncher(params: RunParameters): Promise<void> {
    if (!params.launcher) return;
    const found = await this.env.shell.which(params.launcher.command);
    if (!found) {
      throw new DependencyMissingError(
        `${params.launcher.command} not found; please install it or pass --launcher.`
      );
    }
  }

  /**
   * Run the harness for the given argv and return the process exit code
   */
  async run(argv: string[]): Promise<CliRunResult> {
    try {
      const cliArgs = parseCliArgs(argv);
      handleHelp(cliArgs, text => this.ui.log(text));

      const settings = await loadProjectSettings(this.env.fs, this.cwd);
      const params = resolveRunParameters(cliArgs, settings, this.cwd);

      const logger = this.fileLogging ? initLogger(params.workRoot) : getLogger();
      logger.info({ params }, "Session started");

      const examples = await resolveExampleSet(
        { configPath: cliArgs.configPath, listPath: cliArgs.listPath },
        this.env.fs,
        this.cwd
      );

      await this.checkLauncher(params);

      await prepareSandbox(this.env.fs, params);

      const { summary, outcomes } = await runExamples(examples, params, {
        env: this.env,
        ui: this.ui,
        cwd: this.cwd,
      });

      for (const line of formatSummary(summary)) {
        this.ui.log(line);
      }

      if (cliArgs.junitPath) {
        const reportPath = resolve(this.cwd, cliArgs.junitPath);
        try {
          await this.env.fs.write(reportPath, formatJUnitReport(outcomes));
          logger.info({ reportPath }, "JUnit report written");
        } catch (err) {
          // Report failures leave the exit code alone
          this.ui.warn(`Warning: cannot write JUnit report ${reportPath}: ${errorMessage(err)}`);
        }
      }

      const exitCode = summaryExitCode(summary);
      logger.info({ exitCode }, "Session ended");
      return { exitCode, summary, logPath: getCurrentLogPath() };
    } catch (err) {
      const logPath = getCurrentLogPath();

      if (err instanceof HarnessError) {
        if (err.code === 0) {
          return { exitCode: 0 };
        }
        this.printErrorWithLogPath(err.message, logPath);
        if (err instanceof UsageError) {
          this.ui.error(usage());
        }
        return { exitCode: err.code, errorMessage: err.message, logPath };
      }

      const message = errorMessage(err);
      getLogger().error({ error: message }, "Unexpected setup failure");
      this.printErrorWithLogPath(message, logPath);
      return { exitCode: EXIT_USAGE, errorMessage: message, logPath };
    }
  }
}
