/**
 * Formula Atlas - Library Entry Point
 *
 * Exports the enumeration core and the report renderers. Nothing here
 * touches the console or the process arguments; that lives in cli.ts.
 */

// Run driver
export { createEnumerator, enumerate, Enumerator } from './enumerator.js';

// Core components
export { FormulaFactory, createFormulaFactory } from './formula/factory.js';
export { FormulaGenerator, createGenerator } from './generator/generator.js';
export { SizeClassPool } from './generator/pool.js';
export { estimateClassSizes, nextClassSize, largestSizeWithin } from './generator/tractability.js';
export { TruthTableEvaluator, createEvaluator, buildVariableMasks } from './evaluator/evaluator.js';
export { TruthTable, countPossibleTables, fullMask, MAX_VARIABLES } from './evaluator/truthTable.js';
export { Catalog, createCatalog } from './catalog/catalog.js';
export { judge, isMinimal } from './catalog/policy.js';

// Progress
export { spinnerProgress } from './progress.js';

// Formulas
export { parse, Tokenizer, Parser } from './parser/index.js';
export { formulaToString, defaultVariableNames } from './formula/printer.js';
export { sameStructure, structuralKey, countBinaryOperators } from './formula/structure.js';

// Reports
export { renderHtmlReport, htmlFileName } from './report/html.js';
export { renderTextReport, renderFormulaList, FORMULA_LIST_FILE_NAME } from './report/text.js';
export { ReportWriter, defaultOutputDirectory } from './report/writer.js';

// Types and Interfaces
export * from './types/index.js';
export type { EvaluationMode } from './evaluator/evaluator.js';
export type { Bit } from './evaluator/truthTable.js';
export type { FormulaRef } from './generator/pool.js';
export type { SizeClassEstimate } from './generator/tractability.js';
export type { IngestResult } from './catalog/catalog.js';
export type { MinimalityVerdict } from './catalog/policy.js';
export type { ReportFile, HtmlReportOptions } from './report/html.js';
export type { ProgressCallback, ProgressDisplay } from './progress.js';
