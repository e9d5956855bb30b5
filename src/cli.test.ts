import { describe, test, expect } from "vitest";
import { handleHelp, parseCliArgs, usage } from "./cli";
import { EarlyExitRequest, UsageError } from "./errors";

const argv = (...args: string[]) => ["node", "simcheck", ...args];

describe("parseCliArgs", () => {
  test("parses the short options", () => {
    expect(
      parseCliArgs(argv("-n", "50", "-b", "build-rel", "-e", "/opt/Prandtl", "-o", "runs", "-c", "a/config.json"))
    ).toEqual({
      help: false,
      stepCount: 50,
      buildDir: "build-rel",
      executable: "/opt/Prandtl",
      runDir: "runs",
      configPath: "a/config.json",
    });
  });

  test("accepts attached short values", () => {
    expect(parseCliArgs(argv("-n20", "-lexamples.txt"))).toEqual({
      help: false,
      stepCount: 20,
      listPath: "examples.txt",
    });
  });

  test("parses long options in both forms", () => {
    expect(parseCliArgs(argv("--launcher", "none", "--timeout=90", "--workers", "4", "--junit=report.xml"))).toEqual({
      help: false,
      launcher: "none",
      timeoutSeconds: 90,
      workers: 4,
      junitPath: "report.xml",
    });
  });

  test("parses --help", () => {
    expect(parseCliArgs(argv("-h")).help).toBe(true);
    expect(parseCliArgs(argv("--help")).help).toBe(true);
  });

  test("the last occurrence wins", () => {
    expect(parseCliArgs(argv("-n", "10", "-n", "30")).stepCount).toBe(30);
  });

  test("rejects a non-numeric step count", () => {
    expect(() => parseCliArgs(argv("-n", "ten"))).toThrow("Option -n expects a whole number, got 'ten'.");
  });

  test("rejects zero workers", () => {
    expect(() => parseCliArgs(argv("--workers", "0"))).toThrow("Option --workers must be at least 1, got 0.");
  });

  test("rejects a non-positive default dt", () => {
    expect(() => parseCliArgs(argv("--default-dt", "0"))).toThrow("Option --default-dt must be positive, got 0.");
  });

  test("rejects an unknown option", () => {
    expect(() => parseCliArgs(argv("-x"))).toThrow("Unknown option -x");
  });

  test("rejects a positional argument", () => {
    expect(() => parseCliArgs(argv("config.json"))).toThrow("Unexpected argument 'config.json'");
  });

  test("rejects a missing value", () => {
    expect(() => parseCliArgs(argv("-c"))).toThrow(UsageError);
    expect(() => parseCliArgs(argv("-c"))).toThrow("Option -c requires an argument.");
  });
});

describe("usage", () => {
  test("names the program and both input modes", () => {
    const text = usage("simcheck");
    expect(text).toContain("Usage: simcheck [-n STEPS]");
    expect(text).toContain("(-c CONFIG.json | -l LIST.txt)");
  });
});

describe("handleHelp", () => {
  test("prints usage and requests an early exit", () => {
    const printed: string[] = [];
    expect(() => handleHelp({ help: true }, text => printed.push(text))).toThrow(EarlyExitRequest);
    expect(printed).toEqual([usage()]);
  });

  test("does nothing without --help", () => {
    const printed: string[] = [];
    handleHelp({ help: false }, text => printed.push(text));
    expect(printed).toEqual([]);
  });
});
