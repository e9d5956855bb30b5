/**
 * Output Validator
 * A run passes only if it wrote the manifest and the first and last snapshots.
 */

import { join } from "node:path";
import { getValidateLogger } from "./logger";
import type { FileSystem } from "./system-environment";
import type { ArtifactLayout } from "./types";

/** Default snapshot layout written by the simulation */
export const DEFAULT_ARTIFACT_LAYOUT: ArtifactLayout = {
  manifestDir: "ParaView",
  manifestFile: "ParaView.pvd",
};

/** A file or directory the run must leave behind */
export interface RequiredArtifact {
  path: string;
  type: "file" | "directory";
}

/**
 * Zero-pad a cycle index to 6 digits: 0 → "000000", 100 → "000100"
 */
export function formatCycle(cycle: number): string {
  return String(cycle).padStart(6, "0");
}

/**
 * Cycle directory name, e.g. "Cycle000100"
 */
export function cycleDirName(cycle: number): string {
  return `Cycle${formatCycle(cycle)}`;
}

/**
 * Artifacts required after an N-step run, in check order
 */
export function requiredArtifacts(
  outputDirectory: string,
  stepCount: number,
  layout: ArtifactLayout = DEFAULT_ARTIFACT_LAYOUT
): RequiredArtifact[] {
  const base = join(outputDirectory, layout.manifestDir);
  return [
    { path: join(base, layout.manifestFile), type: "file" },
    { path: join(base, cycleDirName(0)), type: "directory" },
    { path: join(base, cycleDirName(stepCount)), type: "directory" },
  ];
}

/**
 * Check the output directory for the required artifacts
 *
 * @returns Paths of the missing artifacts; empty means the outputs are complete
 */
export async function findMissingArtifacts(
  fs: FileSystem,
  outputDirectory: string,
  stepCount: number,
  layout: ArtifactLayout = DEFAULT_ARTIFACT_LAYOUT
): Promise<string[]> {
  const missing: string[] = [];

  for (const artifact of requiredArtifacts(outputDirectory, stepCount, layout)) {
    const info = await fs.info(artifact.path);
    const present = artifact.type === "file" ? info?.isFile : info?.isDirectory;
    if (!present) {
      missing.push(artifact.path);
    }
  }

  getValidateLogger().debug({ outputDirectory, stepCount, missing }, "Outputs checked");
  return missing;
}
