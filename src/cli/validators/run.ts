export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type RunCommandOptions = {
  out?: string;
  maxIterations?: string;
  verbose?: boolean;
};

export type ValidatedRunOptions = {
  task: string;
  outputDir?: string;
  maxIterations?: number;
  verbose: boolean;
};

/**
 * Validate `run` and `compile` command input
 *
 * @throws {ValidationError} If validation fails
 */
export function validateRunOptions(task: string, options: RunCommandOptions): ValidatedRunOptions {
  const trimmed = task.trim();
  if (!trimmed) {
    throw new ValidationError('Task description must not be empty');
  }

  let maxIterations: number | undefined;
  if (options.maxIterations !== undefined) {
    if (!/^\d+$/.test(options.maxIterations.trim())) {
      throw new ValidationError(`--max-iterations must be a whole number, got "${options.maxIterations}"`);
    }
    maxIterations = Number(options.maxIterations);
    if (maxIterations < 1) {
      throw new ValidationError('--max-iterations must be >= 1');
    }
  }

  const outputDir = options.out?.trim() || undefined;

  return { task: trimmed, outputDir, maxIterations, verbose: Boolean(options.verbose) };
}
