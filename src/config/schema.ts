/**
 * Validation schemas for run and command line configuration
 */

import { z } from 'zod';
import { MAX_VARIABLES } from '../evaluator/truthTable.js';
import { DEFAULTS, DEFAULT_MAX_SIZE, type EnumerationOptions } from '../types/options.js';
import { createInvalidOptionsError } from '../types/errors.js';
import type { EvaluationMode } from '../evaluator/evaluator.js';

export const VariableCountSchema = z.number().int().min(1).max(MAX_VARIABLES);

export const EnumerationOptionsSchema = z.object({
    variableCount: VariableCountSchema.default(DEFAULTS.variableCount),
    maxSize: z.number().int().min(0).optional(),
    maxFormulas: z.number().int().positive().default(DEFAULTS.maxFormulas),
    evaluation: z.enum(['bitwise', 'per-assignment']).default(DEFAULTS.evaluation),
    stopWhenComplete: z.boolean().default(DEFAULTS.stopWhenComplete),
});

export interface ResolvedEnumerationOptions {
    variableCount: number;
    maxSize: number;
    maxFormulas: number;
    evaluation: EvaluationMode;
    stopWhenComplete: boolean;
    onProgress?: (progress: number | undefined, message: string) => void;
}

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}

/**
 * Apply defaults and validate; throws INVALID_OPTIONS
 */
export function resolveEnumerationOptions(options: EnumerationOptions = {}): ResolvedEnumerationOptions {
    const { onProgress, ...data } = options;
    const parsed = EnumerationOptionsSchema.safeParse(data);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw createInvalidOptionsError(`Invalid enumeration options: ${issues.join('; ')}`, issues);
    }
    const { variableCount } = parsed.data;
    return {
        ...parsed.data,
        maxSize: parsed.data.maxSize ?? DEFAULT_MAX_SIZE[variableCount],
        onProgress,
    };
}
