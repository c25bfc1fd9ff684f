import type { ZodError } from 'zod';

/** Base error class for money formatting errors. */
export class MoneyError extends Error {
  /** Machine-readable error code (e.g. UNKNOWN_CURRENCY, INVALID_OPTIONS). */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'MoneyError';
    this.code = code;
  }
}

/** Error thrown for an unknown currency, bad options, or a malformed currency table. */
export class ConfigurationError extends MoneyError {
  /** One `path: message` line per validation issue. */
  readonly issues: string[];

  constructor(code: string, message: string, issues: string[] = []) {
    super(code, issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  /** Build a ConfigurationError listing every issue of a failed zod parse. */
  static fromZodError(code: string, message: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new ConfigurationError(code, message, issues);
  }
}

/** Error thrown when the amount is NaN or infinite. */
export class InvalidAmountError extends MoneyError {
  readonly amount: number;

  constructor(amount: number) {
    super('INVALID_AMOUNT', `Amount must be a finite number, got ${amount}`);
    this.name = 'InvalidAmountError';
    this.amount = amount;
  }
}
