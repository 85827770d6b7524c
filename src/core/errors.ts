/**
 * Error types raised by the linter core
 */

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `Invalid configuration in ${configPath}: ${message}` : `Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ParseError extends Error {
  constructor(public readonly reason: string, public readonly line: number, public readonly column: number) {
    super(`${reason} at ${line}:${column}`);
    this.name = 'ParseError';
  }
}

export class RuleExecutionError extends Error {
  constructor(public readonly ruleId: string, public readonly fileName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rule "${ruleId}" failed on ${fileName}: ${reason}`);
    this.name = 'RuleExecutionError';
  }
}
