/**
 * Structured Error System for Formula Atlas
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for catalog operations
 */
export type CatalogErrorCode =
  | 'INVALID_OPTIONS'       // Run or CLI configuration failed validation
  | 'INVALID_VARIABLE'      // Variable index or name outside 0..n-1
  | 'PARSE_ERROR'           // Syntax errors in formula
  | 'DUPLICATE_INGEST'      // Same formula handed to the catalog twice
  | 'FOREIGN_FORMULA'       // Node built by a different FormulaFactory
  | 'CATALOG_FINALIZED'     // Mutation attempted after finalize()
  | 'WIDTH_MISMATCH'        // Truth table built for another variable count
  | 'OUTPUT_ERROR';         // Report could not be written

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface CatalogError {
  code: CatalogErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula or option
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping CatalogError for throw/catch patterns
 */
export class CatalogException extends Error {
  public readonly error: CatalogError;

  constructor(error: CatalogError) {
    super(error.message);
    this.name = 'CatalogException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogException);
    }
  }

  get code(): CatalogErrorCode {
    return this.error.code;
  }

  toJSON(): CatalogError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /&\s*$/,
      suggestion: "Incomplete conjunction - missing right operand after '&'"
    },
    {
      pattern: /\|\s*$/,
      suggestion: "Incomplete disjunction - missing right operand after '|'"
    },
    {
      pattern: /\^\s*$/,
      suggestion: "Incomplete exclusive or - missing right operand after '^'"
    },
    {
      pattern: /[~!-]\s*$/,
      suggestion: "Incomplete negation - missing operand after '~'"
    },
    {
      pattern: /&&|\|\|/,
      suggestion: "Use single '&' and '|' for conjunction and disjunction"
    },
    {
      pattern: /->|<->/,
      suggestion: "Implication is not part of the operator alphabet - use '~a | b' instead of 'a -> b'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): CatalogException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new CatalogException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create an invalid options error from validation issues
 */
export function createInvalidOptionsError(
  message: string,
  issues: string[] = []
): CatalogException {
  return new CatalogException({
    code: 'INVALID_OPTIONS',
    message,
    suggestion: 'Run with --help to see the accepted options and ranges',
    details: issues.length > 0 ? { issues } : undefined,
  });
}

/**
 * Create an unknown variable error
 */
export function createInvalidVariableError(
  variable: number | string,
  variableCount: number,
  context?: string
): CatalogException {
  return new CatalogException({
    code: 'INVALID_VARIABLE',
    message: typeof variable === 'number'
      ? `Variable index ${variable} is outside 0..${variableCount - 1}`
      : `Unknown variable '${variable}'`,
    suggestion: `Formulas over ${variableCount} variable(s) may only use the configured variable names`,
    context,
    details: { variable, variableCount },
  });
}

/**
 * Create a duplicate ingestion error
 */
export function createDuplicateIngestError(formulaId: number, text?: string): CatalogException {
  return new CatalogException({
    code: 'DUPLICATE_INGEST',
    message: `Formula #${formulaId} was already ingested`,
    suggestion: 'Each generated formula must reach the catalog exactly once',
    context: text,
    details: { formulaId },
  });
}

/**
 * Create an error for a node that belongs to another factory
 */
export function createForeignFormulaError(formulaId: number): CatalogException {
  return new CatalogException({
    code: 'FOREIGN_FORMULA',
    message: `Formula #${formulaId} was built by a different formula factory`,
    suggestion: 'Build every formula of a run with the factory the catalog was created from',
    details: { formulaId },
  });
}

/**
 * Create a finalized catalog error
 */
export function createCatalogFinalizedError(operation: string): CatalogException {
  return new CatalogException({
    code: 'CATALOG_FINALIZED',
    message: `Cannot ${operation}: the catalog is finalized and read-only`,
    suggestion: 'Start a new run to catalog more formulas',
  });
}

/**
 * Create a truth table width mismatch error
 */
export function createWidthMismatchError(
  expectedVariables: number,
  actualVariables: number
): CatalogException {
  return new CatalogException({
    code: 'WIDTH_MISMATCH',
    message: `Truth table over ${actualVariables} variable(s) cannot be used with a catalog over ${expectedVariables}`,
    details: { expectedVariables, actualVariables },
  });
}

/**
 * Create an output error
 */
export function createOutputError(
  message: string,
  details?: Record<string, unknown>
): CatalogException {
  return new CatalogException({
    code: 'OUTPUT_ERROR',
    message: `Could not write report: ${message}`,
    suggestion: 'Check that the output directory is writable or pass --out',
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a CatalogError for JSON output
 */
export function serializeCatalogError(error: CatalogError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic catalog error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: CatalogErrorCode,
  message: string,
  details?: Record<string, unknown>
): CatalogException {
  return new CatalogException({
    code,
    message,
    details,
  });
}
