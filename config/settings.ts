/**
 * @file settings.ts
 * @description Loads the scenario file and the runtime environment, both validated with zod.
 *
 * Two inputs configure a collection run:
 *
 *   config/scenarios.json   What to collect: models, batch sizes, context
 *                           lengths, user counts, hardware and KV-cache labels.
 *   process.env (+ .env)    How to run: headless or not, where to write files,
 *                           which scenario file to read, URL override.
 */

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { z } from 'zod';

export const DEFAULT_SCENARIO_FILE = 'config/scenarios.json';
export const DEFAULT_OUTPUT_DIR = 'Reports/vram-results';

const modelSchema = z.object({
  displayName: z.string().min(1),
  siteName: z.string().min(1),
  quantization: z.string().min(1)
});

const contextLengthSchema = z.object({
  tokens: z.number().int().positive(),
  label: z.string().min(1)
});

const positiveIntegers = z.array(z.number().int().positive()).min(1);

export const scenarioConfigSchema = z.object({
  calculatorUrl: z.string().url(),
  hardware: z.string().min(1),
  kvCacheQuantization: z.string().min(1),
  models: z.array(modelSchema).min(1),
  batchSizes: positiveIntegers,
  contextLengths: z.array(contextLengthSchema).min(1),
  concurrentUsers: positiveIntegers
});

export type ModelConfig = z.infer<typeof modelSchema>;
export type ContextLength = z.infer<typeof contextLengthSchema>;
export type ScenarioConfig = z.infer<typeof scenarioConfigSchema>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const environmentSchema = z.object({
  HEADLESS: booleanFlag.default('false'),
  OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  SCENARIO_FILE: z.string().min(1).default(DEFAULT_SCENARIO_FILE),
  VRAM_CALCULATOR_URL: z.string().url().optional()
});

export interface RuntimeSettings {
  headless: boolean;
  /** Absolute directory for CSV and summary output. */
  outputDir: string;
  /** Absolute path of the scenario file. */
  scenarioFile: string;
  calculatorUrlOverride?: string;
}

/** Raised when the scenario file or the environment does not validate. */
export class ConfigurationError extends Error {
  constructor(source: string, readonly issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate an already-parsed scenario document.
 * `source` only labels the error message.
 */
export function parseScenarioConfig(raw: unknown, source = 'scenario config'): ScenarioConfig {
  const parsed = scenarioConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(source, describeIssues(parsed.error));
  }
  return parsed.data;
}

export async function loadScenarioConfig(filePath: string): Promise<ScenarioConfig> {
  const text = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, [message]);
  }
  return parseScenarioConfig(raw, filePath);
}

/** Relative paths resolve against `cwd`, like the rest of the project's output paths. */
export function loadRuntimeSettings(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeSettings {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('environment', describeIssues(parsed.error));
  }
  const { HEADLESS, OUTPUT_DIR, SCENARIO_FILE, VRAM_CALCULATOR_URL } = parsed.data;
  return {
    headless: HEADLESS,
    outputDir: path.resolve(cwd, OUTPUT_DIR),
    scenarioFile: path.resolve(cwd, SCENARIO_FILE),
    calculatorUrlOverride: VRAM_CALCULATOR_URL
  };
}
