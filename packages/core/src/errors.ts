/**
 * Configuration errors
 * Raised at load time only; record-level problems surface as result values.
 */

export class ConfigError extends Error {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[], options?: { cause?: unknown }) {
    super(`Invalid configuration in ${source}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`, options);
    this.name = 'ConfigError';
    this.source = source;
    this.issues = issues;
  }
}
