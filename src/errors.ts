/**
 * StrideGraph — Error types.
 *
 * Input problems inside a detection list never throw; they become
 * diagnostics. Everything here is either a caller error (bad config,
 * bad input file) or a programmer error (broken rule table, template
 * referencing a field that does not exist).
 */

export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  RULE_TABLE_INVALID = 'RULE_TABLE_INVALID',
  RULE_TABLE_INCOMPLETE = 'RULE_TABLE_INCOMPLETE',
  TEMPLATE_FIELD_MISSING = 'TEMPLATE_FIELD_MISSING',
  INPUT_INVALID = 'INPUT_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}

type ErrorContext = Record<string, string | number | boolean | null | undefined>;

export class StrideGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, userMessage?: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'StrideGraphError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    Error.captureStackTrace(this, StrideGraphError);
  }

  static fromError(error: unknown, code = ErrorCode.INTERNAL_UNKNOWN, userMessage?: string): StrideGraphError {
    if (error instanceof StrideGraphError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new StrideGraphError(message, code, userMessage, context);
  }
}

export class ConfigurationError extends StrideGraphError {
  constructor(message: string, configKey?: string) {
    super(message, ErrorCode.CONFIG_INVALID, `Configuration issue: ${message}`, { configKey });
    this.name = 'ConfigurationError';
  }
}

export class RuleTableError extends StrideGraphError {
  constructor(message: string, code: ErrorCode.RULE_TABLE_INVALID | ErrorCode.RULE_TABLE_INCOMPLETE, context: ErrorContext = {}) {
    super(message, code, `Rule table rejected: ${message}`, context);
    this.name = 'RuleTableError';
  }
}

export class TemplateError extends StrideGraphError {
  constructor(field: string, ruleId: string) {
    super(
      `Template of rule ${ruleId} references unknown field {${field}}`,
      ErrorCode.TEMPLATE_FIELD_MISSING,
      undefined,
      { field, ruleId },
    );
    this.name = 'TemplateError';
  }
}

export class InputError extends StrideGraphError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.INPUT_INVALID, `Invalid input: ${message}`, context);
    this.name = 'InputError';
  }
}
