import { describe, test, expect } from "vitest";
import { ConflictingInputsError, NoInputSpecifiedError, UsageError } from "./errors";
import { exampleNameFor, isConfigLine, parseListFile, resolveExampleSet } from "./examples";
import { createTestEnvironment } from "./system-environment";

describe("isConfigLine", () => {
  test("accepts a path", () => {
    expect(isConfigLine("cases/A/config.json")).toBe(true);
  });

  test("rejects blank and whitespace-only lines", () => {
    expect(isConfigLine("")).toBe(false);
    expect(isConfigLine("   \t")).toBe(false);
  });

  test("rejects comments, including indented ones", () => {
    expect(isConfigLine("# disabled")).toBe(false);
    expect(isConfigLine("   # disabled")).toBe(false);
  });
});

describe("parseListFile", () => {
  test("keeps config lines in order", () => {
    const content = [
      "# nightly set",
      "cases/A/config.json",
      "",
      "# cases/B/config.json",
      "cases/C/config.json",
    ].join("\n");
    expect(parseListFile(content)).toEqual(["cases/A/config.json", "cases/C/config.json"]);
  });

  test("strips carriage returns", () => {
    expect(parseListFile("a/config.json\r\nb/config.json\r\n")).toEqual([
      "a/config.json",
      "b/config.json",
    ]);
  });
});

describe("exampleNameFor", () => {
  test("is the config's parent directory name", () => {
    expect(exampleNameFor("cases/NavierStokes/2D/LidDrivenCavity/config.json", "/repo")).toBe(
      "LidDrivenCavity"
    );
  });

  test("resolves a bare file name against cwd", () => {
    expect(exampleNameFor("config.json", "/repo/cases/Poiseuille")).toBe("Poiseuille");
  });
});

describe("resolveExampleSet", () => {
  test("a single config yields one example", async () => {
    const env = createTestEnvironment();
    const examples = await resolveExampleSet({ configPath: "cases/A/config.json" }, env.fs, "/repo");
    expect(examples).toEqual([{ configPath: "cases/A/config.json", name: "A" }]);
  });

  test("a list file yields its config lines", async () => {
    const env = createTestEnvironment();
    env.addFile(
      "/repo/examples.txt",
      "# header\ncases/A/config.json\n\n  # skipped\ncases/B/config.json\n"
    );

    const examples = await resolveExampleSet({ listPath: "examples.txt" }, env.fs, "/repo");
    expect(examples).toEqual([
      { configPath: "cases/A/config.json", name: "A" },
      { configPath: "cases/B/config.json", name: "B" },
    ]);
  });

  test("both sources is a conflict", async () => {
    const env = createTestEnvironment();
    await expect(
      resolveExampleSet({ configPath: "a/config.json", listPath: "list.txt" }, env.fs, "/repo")
    ).rejects.toBeInstanceOf(ConflictingInputsError);
  });

  test("neither source is an error", async () => {
    const env = createTestEnvironment();
    await expect(resolveExampleSet({}, env.fs, "/repo")).rejects.toBeInstanceOf(NoInputSpecifiedError);
  });

  test("an unreadable list file is a usage error", async () => {
    const env = createTestEnvironment();
    await expect(resolveExampleSet({ listPath: "missing.txt" }, env.fs, "/repo")).rejects.toThrow(
      /^cannot read list file missing.txt: /
    );
    await expect(resolveExampleSet({ listPath: "missing.txt" }, env.fs, "/repo")).rejects.toBeInstanceOf(
      UsageError
    );
  });

  test("a list with only comments names no configs", async () => {
    const env = createTestEnvironment();
    env.addFile("/repo/empty.txt", "# nothing here\n\n");
    await expect(resolveExampleSet({ listPath: "empty.txt" }, env.fs, "/repo")).rejects.toThrow(
      "list file empty.txt names no configs"
    );
  });
});
