export class FatalConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'FatalConfigError';
    this.issues = issues;
  }
}
