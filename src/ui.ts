/**
 * Output sink for progress lines, failure reasons and the final summary
 *
 * The example loop writes through this interface instead of console so tests
 * can assert on the exact report.
 */

export interface UserInterface {
  /** Progress and summary lines (stdout) */
  log(message: string): void;
  /** Setup errors (stderr) */
  error(message: string): void;
  /** Problems that do not change the exit code (stderr) */
  warn(message: string): void;
}

export class ConsoleUI implements UserInterface {
  log(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }
}

/**
 * Records every line, split by stream
 */
export class TestUI implements UserInterface {
  private lines: Record<"log" | "error" | "warn", string[]> = { log: [], error: [], warn: [] };

  log(message: string): void {
    this.lines.log.push(message);
  }

  error(message: string): void {
    this.lines.error.push(message);
  }

  warn(message: string): void {
    this.lines.warn.push(message);
  }

  getLogs(): string[] {
    return [...this.lines.log];
  }

  getErrors(): string[] {
    return [...this.lines.error];
  }

  getWarnings(): string[] {
    return [...this.lines.warn];
  }

  reset(): void {
    this.lines = { log: [], error: [], warn: [] };
  }
}
