import { JobError } from './base.error';

/**
 * Config error - environment failed validation
 */
export class ConfigError extends JobError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, { context: { issues } }, 'CONFIG_ERROR');
    this.issues = issues;
  }
}
