import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, chmod } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  EXIT_SPAWN_FAILED,
  EXIT_TIMED_OUT,
  InMemorySystemEnvironment,
  NodeSystemEnvironment,
  createTestEnvironment,
  signalExitCode,
} from "./system-environment";

describe("signalExitCode", () => {
  test("is 128 plus the signal number", () => {
    expect(signalExitCode("SIGINT")).toBe(130);
    expect(signalExitCode("SIGKILL")).toBe(137);
    expect(signalExitCode("SIGTERM")).toBe(143);
  });
});

describe("NodeSystemEnvironment", () => {
  let dir: string;
  const env = new NodeSystemEnvironment();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "simcheck-env-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("write creates parent directories", async () => {
    const path = join(dir, "a", "b", "config.patched.json");
    await env.fs.write(path, "{}\n");
    expect(await env.fs.readText(path)).toBe("{}\n");
  });

  test("info describes files and directories", async () => {
    const file = join(dir, "plain.txt");
    await writeFile(file, "x");

    expect(await env.fs.info(file)).toEqual({ isFile: true, isDirectory: false, executable: false });
    expect((await env.fs.info(dir))?.isDirectory).toBe(true);
    expect(await env.fs.info(join(dir, "nope"))).toBeNull();
  });

  test("copyExecutable makes the copy executable and overwrites", async () => {
    const source = join(dir, "Prandtl");
    const target = join(dir, "run", "Prandtl");
    await writeFile(source, "v2");
    await chmod(source, 0o755);
    await env.fs.mkdir(join(dir, "run"));
    await writeFile(target, "v1");

    await env.fs.copyExecutable(source, target);

    expect(await env.fs.readText(target)).toBe("v2");
    expect((await env.fs.info(target))?.executable).toBe(true);
  });

  test("remove deletes a tree and ignores missing paths", async () => {
    await env.fs.write(join(dir, "work", "out", "file.txt"), "x");
    await env.fs.remove(join(dir, "work"));
    expect(await env.fs.exists(join(dir, "work"))).toBe(false);
    await expect(env.fs.remove(join(dir, "work"))).resolves.toBeUndefined();
  });

  test("execute reports a command that cannot start", async () => {
    const result = await env.shell.execute(join(dir, "missing-binary"), [], { stdout: "pipe", stderr: "pipe" });
    expect(result.exitCode).toBe(EXIT_SPAWN_FAILED);
    expect(result.timedOut).toBe(false);
  });

  test("a timeout kills the process and reports 124", async () => {
    const result = await env.shell.execute("sleep", ["30"], { timeoutMs: 100 });
    expect(result).toMatchObject({ exitCode: EXIT_TIMED_OUT, timedOut: true });
  });

  test("a process that ignores SIGTERM is killed after the grace period", async () => {
    const started = Date.now();
    const result = await env.shell.execute("sh", ["-c", "trap '' TERM; exec sleep 30"], { timeoutMs: 100 });
    const elapsed = Date.now() - started;

    expect(result).toMatchObject({ exitCode: EXIT_TIMED_OUT, timedOut: true });
    expect(elapsed).toBeGreaterThanOrEqual(5000);
    expect(elapsed).toBeLessThan(15000);
  }, 20000);

  test("an abort terminates the process with the SIGTERM status", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await env.shell.execute("sleep", ["30"], { signal: controller.signal });
    expect(result).toMatchObject({ exitCode: 143, timedOut: false });
  });

  test("an abort after a timeout still reports the timeout", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);

    const result = await env.shell.execute("sh", ["-c", "trap '' TERM; exec sleep 30"], {
      timeoutMs: 100,
      signal: controller.signal,
    });

    expect(result).toMatchObject({ exitCode: EXIT_TIMED_OUT, timedOut: true });
  }, 20000);

  test("a process that exits normally keeps its exit code", async () => {
    const result = await env.shell.execute("sh", ["-c", "echo out; exit 3"], { stdout: "pipe", timeoutMs: 10000 });
    expect(result).toEqual({ exitCode: 3, stdout: "out\n", stderr: "", timedOut: false });
  });

  test("which returns null for an unknown command", async () => {
    expect(await env.shell.which("simcheck-no-such-command")).toBeNull();
  });
});

describe("InMemorySystemEnvironment", () => {
  let env: InMemorySystemEnvironment;

  beforeEach(() => {
    env = createTestEnvironment();
  });

  test("addFile creates parent directories", async () => {
    env.addFile("/a/b/c.txt", "x");
    expect((await env.fs.info("/a/b"))?.isDirectory).toBe(true);
    expect(await env.fs.readText("/a/b/c.txt")).toBe("x");
  });

  test("readText fails for a missing file", async () => {
    await expect(env.fs.readText("/missing")).rejects.toThrow("ENOENT");
  });

  test("mocked commands are installed and recorded", async () => {
    env.mockCommand("mpiexec", { exitCode: 0, stdout: "ok" });

    expect(await env.shell.which("mpiexec")).toBe("/usr/bin/mpiexec");
    const result = await env.shell.execute("mpiexec", ["-n", "2"]);
    expect(result).toEqual({ exitCode: 0, stdout: "ok", stderr: "", timedOut: false });
    expect(env.executedCommands.map(c => c.args)).toEqual([["-n", "2"]]);
  });

  test("a full pattern wins over the command name", async () => {
    env.mockCommand("mpiexec", { exitCode: 0 });
    env.mockCommand("mpiexec -n 2 ../Prandtl", { exitCode: 9 });

    expect((await env.shell.execute("mpiexec", ["-n", "2", "../Prandtl"])).exitCode).toBe(9);
    expect((await env.shell.execute("mpiexec", ["-n", "4", "../Prandtl"])).exitCode).toBe(0);
  });

  test("unknown commands are not found", async () => {
    expect(await env.shell.which("srun")).toBeNull();
    const result = await env.shell.execute("srun", []);
    expect(result.exitCode).toBe(EXIT_SPAWN_FAILED);
    expect(result.stderr).toBe("command not found: srun");
  });

  test("clearRecords forgets executed commands", async () => {
    await env.shell.execute("srun", []);
    env.clearRecords();
    expect(env.executedCommands).toEqual([]);
  });
});
