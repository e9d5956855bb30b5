/**
 * Zod schemas for simulation configs and harness settings files
 * Simulation configs are validated minimally - most keys pass through untouched
 */

import { z } from "zod";

// ============================================================================
// Simulation Config Schema (the example's config.json)
// ============================================================================

/**
 * runTime block - only its shape is checked here.
 * The fields the harness derives (dt, final_time, ...) are read by the patcher,
 * which ignores non-numeric values instead of rejecting them.
 */
export const runTimeSchema = z.record(z.string(), z.unknown())
  .describe("Simulation run-time options");

/** Top-level simulation config - minimal, passthrough everything else */
export const simulationConfigSchema = z.object({
  // null is treated the same as a missing block
  runTime: runTimeSchema.nullable().optional(),
}).passthrough();

/** Type inferred from schema */
export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

// ============================================================================
// Settings Schema (simcheck.config.yaml, .simcheck.yaml, .simcheck.json)
// ============================================================================

const nonEmptyString = z.string().min(1);

/**
 * Harness settings file schema
 * Structure:
 * ```yaml
 * stepCount: 50
 * runDir: ./RunTests
 * launcher: mpirun      # or "none" to run the executable directly
 * workers: 2
 * timeoutSeconds: 600
 * manifestDir: ParaView
 * ```
 */
export const settingsSchema = z.object({
  stepCount: z.number().int().min(0).optional(),
  buildDir: nonEmptyString.optional(),
  executable: nonEmptyString.optional(),
  executableName: nonEmptyString.optional(),
  runDir: nonEmptyString.optional(),
  launcher: nonEmptyString.optional(),
  workers: z.number().int().min(1).optional(),
  timeoutSeconds: z.number().min(0).optional(),
  defaultDt: z.number().positive().optional(),
  manifestDir: nonEmptyString.optional(),
  manifestFile: nonEmptyString.optional(),
}).strict().describe("simcheck settings");

/** Type inferred from settings schema */
export type Settings = z.infer<typeof settingsSchema>;

/**
 * Format zod issues into readable error strings
 */
export function formatZodIssues(issues: Array<{ path: PropertyKey[]; message: string }>): string[] {
  return issues.map(issue => {
    const path = issue.path.map(String).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a parsed simulation config without throwing
 */
export function safeParseSimulationConfig(data: unknown): {
  success: boolean;
  data?: SimulationConfig;
  errors?: string[];
} {
  const result = simulationConfigSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodIssues(result.error.issues) };
}

/**
 * Validate a parsed settings file without throwing
 */
export function safeParseSettings(data: unknown): {
  success: boolean;
  data?: Settings;
  errors?: string[];
} {
  const result = settingsSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodIssues(result.error.issues) };
}
