/**
 * Config Set Resolver
 * Turns -c / -l into the ordered list of examples to run
 */

import { basename, dirname, resolve } from "node:path";
import { ConflictingInputsError, NoInputSpecifiedError, UsageError, errorMessage } from "./errors";
import { getResolveLogger } from "./logger";
import type { FileSystem } from "./system-environment";
import type { ExampleSpec } from "./types";

/** Where the examples come from: exactly one of the two must be set */
export interface ExampleSource {
  configPath?: string;
  listPath?: string;
}

/**
 * Whether a list-file line names a config
 * Blank lines and lines whose first non-whitespace character is '#' do not.
 */
export function isConfigLine(line: string): boolean {
  const trimmed = line.trimStart();
  return trimmed.length > 0 && !trimmed.startsWith("#");
}

/**
 * Extract config paths from list file content, preserving order
 */
export function parseListFile(content: string): string[] {
  return content
    .split("\n")
    .map(line => line.replace(/\r$/, ""))
    .filter(isConfigLine);
}

/**
 * Example name: the directory holding the config
 * e.g. "cases/NavierStokes/2D/LidDrivenCavity/config.json" → "LidDrivenCavity"
 */
export function exampleNameFor(configPath: string, cwd: string = process.cwd()): string {
  return basename(dirname(resolve(cwd, configPath)));
}

/**
 * Build an ExampleSpec for a config path
 */
export function toExampleSpec(configPath: string, cwd: string = process.cwd()): ExampleSpec {
  return { configPath, name: exampleNameFor(configPath, cwd) };
}

/**
 * Resolve the examples to run
 *
 * @throws ConflictingInputsError if both sources are given
 * @throws NoInputSpecifiedError if neither is given or the list names nothing
 * @throws UsageError if the list file cannot be read
 */
export async function resolveExampleSet(
  source: ExampleSource,
  fs: FileSystem,
  cwd: string = process.cwd()
): Promise<ExampleSpec[]> {
  const { configPath, listPath } = source;

  if (configPath && listPath) {
    throw new ConflictingInputsError();
  }

  if (configPath) {
    return [toExampleSpec(configPath, cwd)];
  }

  if (!listPath) {
    throw new NoInputSpecifiedError();
  }

  let content: string;
  try {
    content = await fs.readText(resolve(cwd, listPath));
  } catch (err) {
    throw new UsageError(`cannot read list file ${listPath}: ${errorMessage(err)}`);
  }

  const paths = parseListFile(content);
  getResolveLogger().debug({ listPath, count: paths.length }, "List file parsed");

  if (paths.length === 0) {
    throw new NoInputSpecifiedError(`list file ${listPath} names no configs`);
  }

  return paths.map(path => toExampleSpec(path, cwd));
}
