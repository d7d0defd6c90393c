/**
 * Shared type definitions for Formula Atlas
 */

// Re-export error types
export {
    CatalogException,
    createParseError,
    createInvalidOptionsError,
    createInvalidVariableError,
    createDuplicateIngestError,
    createForeignFormulaError,
    createCatalogFinalizedError,
    createWidthMismatchError,
    createOutputError,
    serializeCatalogError,
    createGenericError,
    getSuggestion,
} from './errors.js';

export type {
    CatalogErrorCode,
    ErrorSpan,
    CatalogError,
} from './errors.js';

// Formula trees
export { BINARY_OPERATORS, OPERATOR_SYMBOLS, NEGATION_SYMBOL, isBinary } from './formula.js';
export type {
    BinaryOperator,
    FormulaType,
    VariableNode,
    NotNode,
    BinaryNode,
    Formula,
} from './formula.js';

// Catalog read side
export type {
    CatalogEntryView,
    CatalogReader,
    RunStatus,
    StopReason,
    SizeClassSummary,
    EnumerationResult,
} from './catalog.js';

// Parser
export type { Token, TokenType } from './parser.js';

// Options
export { DEFAULTS, DEFAULT_MAX_SIZE } from './options.js';
export type { EnumerationOptions } from './options.js';
