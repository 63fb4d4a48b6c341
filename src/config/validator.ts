import { z } from 'zod';

export const ConfigSchema = z.object({
  llm: z.object({
    api_key: z.string(),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2),
    max_output_tokens: z.coerce.number().int().positive(),
    request_timeout_ms: z.coerce.number().int().positive(),
  }),
  sandbox: z.object({
    api_key: z.string(),
    template: z.string().min(1),
    execution_timeout_ms: z.coerce.number().int().positive(),
    workdir: z.string().startsWith('/', { message: 'must be an absolute path' }),
  }),
  workflow: z.object({
    max_iterations: z.coerce.number().int().positive(),
    max_repair_attempts: z.coerce.number().int().nonnegative(),
    stage_timeout_ms: z.coerce.number().int().positive(),
  }),
  output: z.object({
    dir: z.string().min(1),
    state_dir: z.string().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

export function validateConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  return result.data;
}

/** Credentials are only needed by modes that call collaborators */
export function assertCredentials(config: Config): void {
  const missing: string[] = [];
  if (!config.llm.api_key) missing.push('llm.api_key: required (set GEMINI_API_KEY)');
  if (!config.sandbox.api_key) missing.push('sandbox.api_key: required (set E2B_API_KEY)');
  if (missing.length > 0) throw new ConfigValidationError(missing);
}
