/**
 * SystemEnvironment - Adapter pattern for abstracting system dependencies
 *
 * The harness touches the file system (staging the executable, writing patched
 * configs, checking artifacts) and spawns the simulation. Both go through this
 * interface so the whole example loop can be tested without a real launcher.
 */

import { spawn } from "node:child_process";
import { constants as fsConstants, type Stats } from "node:fs";
import { access, chmod, copyFile, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { constants as osConstants } from "node:os";
import { dirname } from "node:path";
import which from "which";

/** Exit code reported when the process could not be started */
export const EXIT_SPAWN_FAILED = 127;

/** Exit code reported for a timed-out process that left no status */
export const EXIT_TIMED_OUT = 124;

/** Grace period between SIGTERM and SIGKILL on timeout or abort */
const KILL_GRACE_MS = 5000;

/**
 * Result from command execution
 */
export interface ShellResult {
  /** Exit code (128 + signal number when killed by a signal) */
  exitCode: number;
  /** Standard output content (empty when inherited) */
  stdout: string;
  /** Standard error content (empty when inherited) */
  stderr: string;
  /** Whether the process was killed because it hit timeoutMs */
  timedOut: boolean;
}

/**
 * Options for command execution
 */
export interface ShellOptions {
  /** Working directory for command execution */
  cwd?: string;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Stdout configuration: "inherit" or "pipe" */
  stdout?: "inherit" | "pipe";
  /** Stderr configuration: "inherit" or "pipe" */
  stderr?: "inherit" | "pipe";
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Kill the process when aborted */
  signal?: AbortSignal;
}

/** What a path points at */
export interface PathInfo {
  isFile: boolean;
  isDirectory: boolean;
  /** Whether the current user may execute it */
  executable: boolean;
}

/**
 * File system operations abstraction
 */
export interface FileSystem {
  /**
   * Read text content from a file
   * @throws Error if file does not exist or cannot be read
   */
  readText(path: string): Promise<string>;

  /**
   * Write text content to a file, creating parent directories
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Check if a file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Describe a path, or null if nothing is there
   */
  info(path: string): Promise<PathInfo | null>;

  /**
   * Create a directory and any missing parents
   */
  mkdir(path: string): Promise<void>;

  /**
   * Remove a file or directory tree; a missing path is not an error
   */
  remove(path: string): Promise<void>;

  /**
   * Copy a file over any existing destination, keeping the executable bit
   */
  copyExecutable(from: string, to: string): Promise<void>;
}

/**
 * Shell/process execution abstraction
 */
export interface Shell {
  /**
   * Run a command to completion
   */
  execute(cmd: string, args: string[], options?: ShellOptions): Promise<ShellResult>;

  /**
   * Check if a command exists in PATH
   * @returns Path to command if found, null otherwise
   */
  which(cmd: string): Promise<string | null>;
}

/**
 * Complete system environment interface
 * Aggregates all system dependencies for easy injection
 */
export interface SystemEnvironment {
  /** File system operations */
  fs: FileSystem;
  /** Process execution */
  shell: Shell;
}

/**
 * Map a terminating signal to the conventional shell exit status
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  for (const [name, signum] of Object.entries(osConstants.signals)) {
    if (name === signal && typeof signum === "number") {
      return 128 + signum;
    }
  }
  return 128;
}

/**
 * NodeSystemEnvironment - Real implementation on node:fs and node:child_process
 */
export class NodeSystemEnvironment implements SystemEnvironment {
  fs: FileSystem = {
    async readText(path: string): Promise<string> {
      return readFile(path, "utf-8");
    },

    async write(path: string, content: string): Promise<void> {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
    },

    async exists(path: string): Promise<boolean> {
      try {
        await access(path);
        return true;
      } catch {
        return false;
      }
    },

    async info(path: string): Promise<PathInfo | null> {
      let stats: Stats;
      try {
        stats = await stat(path);
      } catch {
        return null;
      }
      let executable = false;
      try {
        await access(path, fsConstants.X_OK);
        executable = true;
      } catch {
        executable = false;
      }
      return { isFile: stats.isFile(), isDirectory: stats.isDirectory(), executable };
    },

    async mkdir(path: string): Promise<void> {
      await mkdir(path, { recursive: true });
    },

    async remove(path: string): Promise<void> {
      await rm(path, { recursive: true, force: true });
    },

    async copyExecutable(from: string, to: string): Promise<void> {
      await copyFile(from, to);
      await chmod(to, 0o755);
    },
  };

  shell: Shell = {
    execute(cmd: string, args: string[], options: ShellOptions = {}): Promise<ShellResult> {
      return new Promise(resolvePromise => {
        const child = spawn(cmd, args, {
          cwd: options.cwd,
          env: options.env ? { ...process.env, ...options.env } : process.env,
          stdio: [
            "ignore",
            options.stdout === "pipe" ? "pipe" : "inherit",
            options.stderr === "pipe" ? "pipe" : "inherit",
          ],
        });

        let stdout = "";
        let stderr = "";
        let timedOut = false;
        let settled = false;
        let killTimer: NodeJS.Timeout | undefined;

        child.stdout?.setEncoding("utf-8");
        child.stderr?.setEncoding("utf-8");
        child.stdout?.on("data", (chunk: string) => { stdout += chunk; });
        child.stderr?.on("data", (chunk: string) => { stderr += chunk; });

        const terminate = () => {
          // A timeout followed by an abort sends SIGTERM once
          if (killTimer) return;
          child.kill("SIGTERM");
          killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
        };

        const timeoutTimer = options.timeoutMs
          ? setTimeout(() => {
              timedOut = true;
              terminate();
            }, options.timeoutMs)
          : undefined;

        const onAbort = () => terminate();
        options.signal?.addEventListener("abort", onAbort, { once: true });
        if (options.signal?.aborted) terminate();

        const finish = (result: ShellResult) => {
          if (settled) return;
          settled = true;
          if (timeoutTimer) clearTimeout(timeoutTimer);
          if (killTimer) clearTimeout(killTimer);
          options.signal?.removeEventListener("abort", onAbort);
          resolvePromise(result);
        };

        child.on("error", err => {
          finish({
            exitCode: EXIT_SPAWN_FAILED,
            stdout,
            stderr: stderr + `failed to start ${cmd}: ${err.message}`,
            timedOut,
          });
        });

        child.on("close", (code, signal) => {
          let exitCode: number;
          if (code !== null) {
            exitCode = code;
          } else if (timedOut) {
            exitCode = EXIT_TIMED_OUT;
          } else if (signal) {
            exitCode = signalExitCode(signal);
          } else {
            exitCode = 1;
          }
          finish({ exitCode, stdout, stderr, timedOut });
        });
      });
    },

    async which(cmd: string): Promise<string | null> {
      return which(cmd, { nothrow: true });
    },
  };
}

/**
 * Entry in the virtual file system
 */
interface InMemoryEntry {
  type: "file" | "directory";
  content: string;
  executable: boolean;
}

/**
 * A recorded command invocation
 */
export interface ExecutedCommand {
  cmd: string;
  args: string[];
  options?: ShellOptions;
}

/**
 * MockShellCommand - Predefined response for a command
 */
export interface MockShellCommand {
  /** Exit code to return */
  exitCode: number;
  /** Stdout content */
  stdout?: string;
  /** Stderr content */
  stderr?: string;
  /** Report the run as timed out */
  timedOut?: boolean;
  /**
   * Side effect applied before the result is returned
   * (e.g. writing the files the simulation would have produced)
   */
  effect?: (call: ExecutedCommand, env: InMemorySystemEnvironment) => void;
}

/**
 * InMemorySystemEnvironment - Virtual implementation for testing
 *
 * Provides an in-memory file system and mock command execution, so the
 * harness can be driven end to end without touching disk or spawning anything.
 */
export class InMemorySystemEnvironment implements SystemEnvironment {
  /** Virtual file system storage, keyed by absolute path */
  private entries: Map<string, InMemoryEntry> = new Map();

  /** Mock command responses */
  private shellCommands: Map<string, MockShellCommand> = new Map();

  /** Commands reported as installed by which() */
  private installed: Set<string> = new Set();

  /** Paths that fail on write (for error-path tests) */
  private readOnlyPaths: Set<string> = new Set();

  /** Commands that were executed (for assertions) */
  public executedCommands: ExecutedCommand[] = [];

  /**
   * Add a file, creating its parent directories
   */
  addFile(path: string, content: string, options: { executable?: boolean } = {}): void {
    this.addDirectory(dirname(path));
    this.entries.set(path, { type: "file", content, executable: options.executable ?? false });
  }

  /**
   * Add a directory and its parents
   */
  addDirectory(path: string): void {
    let current = path;
    while (!this.entries.has(current)) {
      this.entries.set(current, { type: "directory", content: "", executable: true });
      const parent = dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }

  /**
   * Get the content of a file, or undefined if it is absent
   */
  getFile(path: string): string | undefined {
    const entry = this.entries.get(path);
    return entry?.type === "file" ? entry.content : undefined;
  }

  /**
   * Make writes to this path fail
   */
  makeReadOnly(path: string): void {
    this.readOnlyPaths.add(path);
  }

  /**
   * Register a mock command response
   * @param pattern - Command name, or command + args joined by space
   */
  mockCommand(pattern: string, response: MockShellCommand): void {
    this.shellCommands.set(pattern, response);
    this.installed.add(pattern.split(" ")[0] ?? pattern);
  }

  /**
   * Report a command as installed without mocking its output
   */
  install(cmd: string): void {
    this.installed.add(cmd);
  }

  /**
   * Clear all recorded commands (for test isolation)
   */
  clearRecords(): void {
    this.executedCommands = [];
  }

  fs: FileSystem = {
    readText: async (path: string): Promise<string> => {
      const entry = this.entries.get(path);
      if (!entry || entry.type !== "file") {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return entry.content;
    },

    write: async (path: string, content: string): Promise<void> => {
      if (this.readOnlyPaths.has(path)) {
        throw new Error(`EACCES: permission denied, open '${path}'`);
      }
      this.addFile(path, content);
    },

    exists: async (path: string): Promise<boolean> => {
      return this.entries.has(path);
    },

    info: async (path: string): Promise<PathInfo | null> => {
      const entry = this.entries.get(path);
      if (!entry) return null;
      return {
        isFile: entry.type === "file",
        isDirectory: entry.type === "directory",
        executable: entry.executable,
      };
    },

    mkdir: async (path: string): Promise<void> => {
      if (this.readOnlyPaths.has(path)) {
        throw new Error(`EACCES: permission denied, mkdir '${path}'`);
      }
      this.addDirectory(path);
    },

    remove: async (path: string): Promise<void> => {
      for (const key of [...this.entries.keys()]) {
        if (key === path || key.startsWith(path + "/")) {
          this.entries.delete(key);
        }
      }
    },

    copyExecutable: async (from: string, to: string): Promise<void> => {
      const source = this.entries.get(from);
      if (!source || source.type !== "file") {
        throw new Error(`ENOENT: no such file or directory, copyfile '${from}'`);
      }
      if (this.readOnlyPaths.has(to)) {
        throw new Error(`EACCES: permission denied, copyfile '${to}'`);
      }
      this.entries.set(to, { type: "file", content: source.content, executable: true });
    },
  };

  shell: Shell = {
    execute: async (cmd: string, args: string[], options?: ShellOptions): Promise<ShellResult> => {
      const call: ExecutedCommand = { cmd, args, options };
      this.executedCommands.push(call);

      // Look for mock command
      const pattern = [cmd, ...args].join(" ");
      const mock = this.shellCommands.get(pattern) ?? this.shellCommands.get(cmd);

      if (!mock) {
        // Default: command not found
        return {
          exitCode: EXIT_SPAWN_FAILED,
          stdout: "",
          stderr: `command not found: ${cmd}`,
          timedOut: false,
        };
      }

      mock.effect?.(call, this);
      return {
        exitCode: mock.exitCode,
        stdout: mock.stdout ?? "",
        stderr: mock.stderr ?? "",
        timedOut: mock.timedOut ?? false,
      };
    },

    which: async (cmd: string): Promise<string | null> => {
      return this.installed.has(cmd) ? `/usr/bin/${cmd}` : null;
    },
  };
}

/**
 * Create a new InMemorySystemEnvironment for testing
 */
export function createTestEnvironment(): InMemorySystemEnvironment {
  return new InMemorySystemEnvironment();
}
