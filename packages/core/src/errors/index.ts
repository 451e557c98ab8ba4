/**
 * Base error for ledger replay failures that end the run.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Missing or invalid command line / environment configuration
 */
export class ConfigurationError extends DomainError {
  readonly code = 'CONFIG_ERROR';
  readonly severity = 'error' as const;
}

/**
 * Unreadable input file or a record that fails decoding
 */
export class TransactionParseError extends DomainError {
  readonly code = 'PARSE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly line?: number | undefined,
    context?: Record<string, unknown>
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`, context);
  }
}

/**
 * Failure while writing the account snapshot
 */
export class OutputError extends DomainError {
  readonly code = 'OUTPUT_ERROR';
  readonly severity = 'error' as const;
}
