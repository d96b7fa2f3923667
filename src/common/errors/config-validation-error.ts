import { SystemError } from './system-error.js';

/**
 * Thrown when a YAML seed file or an environment value fails validation at startup.
 * Code 4010. Severity: critical — the core cannot operate without valid seed data.
 */
export class ConfigValidationError extends SystemError {
  constructor(message: string, validationErrors: string[]) {
    super(4010, message, 'critical', undefined, { validationErrors });
  }
}
