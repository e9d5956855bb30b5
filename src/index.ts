#!/usr/bin/env tsx
import { CliRunner } from "./cli-runner";
import { killCurrentChildProcess } from "./command";
import { NodeSystemEnvironment } from "./system-environment";
import { ConsoleUI } from "./ui";

async function main() {
  // Handle EPIPE gracefully when downstream closes the pipe early
  // (e.g., `simcheck -l examples.txt | head -n 5`)
  process.stdout.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EPIPE") {
      process.exit(0);
    }
    throw err;
  });

  // Kill the running simulation on Ctrl+C / SIGTERM, then exit with
  // 128 + signal number (SIGINT = 2, SIGTERM = 15)
  const handleSignal = (signal: "SIGINT" | "SIGTERM") => {
    killCurrentChildProcess();
    process.exit(signal === "SIGINT" ? 130 : 143);
  };
  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));

  const runner = new CliRunner({ env: new NodeSystemEnvironment(), ui: new ConsoleUI() });
  const result = await runner.run(process.argv);
  process.exit(result.exitCode);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(2);
});
