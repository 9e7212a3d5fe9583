/**
 * Raised (as the error side of a Result) when an analysis cannot start:
 * a missing root, a root that is not a directory, or an invalid config file.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function errorMessage(error: string | Error): string {
  return error instanceof Error ? error.message : error;
}
