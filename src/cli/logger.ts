import { formatError, formatInfo, formatWarning } from './formatters';
import type { WorkflowLogger } from '../utils/logger';

/** Logger that writes directly to the console with optional verbose detail */
export class CLIWorkflowLogger implements WorkflowLogger {
  constructor(private verbose: boolean) {}

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatWarning(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}
