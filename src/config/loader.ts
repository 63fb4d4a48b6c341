import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { validateConfig, ConfigValidationError } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';

/**
 * DeepPartial allows for recursive partials of the Config type.
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding autobuild.yaml and .env (defaults to the working directory) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE = 'autobuild.yaml';

/**
 * Layers: defaults, autobuild.yaml, environment, CLI overrides.
 * The merged result is validated once; any problem throws ConfigValidationError.
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // Load .env into process.env unless the caller supplied its own environment
  if (!options.env) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  // 1. Start with defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with autobuild.yaml (if it exists)
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    let parsedYaml: unknown;
    try {
      parsedYaml = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    } catch (err) {
      throw new ConfigValidationError([`${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`]);
    }
    if (parsedYaml !== null && parsedYaml !== undefined) {
      if (!isPlainObject(parsedYaml)) {
        throw new ConfigValidationError([`${CONFIG_FILE}: top level must be a mapping`]);
      }
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with environment variables
  deepMerge(config, {
    llm: { api_key: env.GEMINI_API_KEY, model: env.GEMINI_MODEL },
    sandbox: { api_key: env.E2B_API_KEY },
    workflow: { max_iterations: env.AUTOBUILD_MAX_ITERATIONS },
    output: { dir: env.AUTOBUILD_OUTPUT_DIR },
  });

  // 4. Override with CLI arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with zod
  return validateConfig(config);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Merges `source` into `target`; undefined and empty-string leaves are skipped */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];

    if (isPlainObject(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isPlainObject(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== '') {
      target[key] = sourceValue;
    }
  }
}
