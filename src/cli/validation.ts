/**
 * Zod validation schemas for CLI inputs
 *
 * These schemas validate and transform user input from the command line.
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Custom validation rules
 * - Helpful error messages
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

/**
 * Optional integer option given as a string on the command line
 */
function integerOption(name: string, min: number) {
  return z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min, { message: `${name} must be at least ${min}` })
    .optional();
}

// ============================================================================
// CHUNK COMMAND SCHEMA
// ============================================================================

export const ChunkOptionsSchema = z
  .object({
    maxTokens: integerOption('--max-tokens', 1),
    minTokens: integerOption('--min-tokens', 0),
    overlap: integerOption('--overlap', 0),
    withContent: z.boolean().default(false),
  })
  .refine(
    (options) =>
      options.maxTokens === undefined ||
      options.minTokens === undefined ||
      options.minTokens <= options.maxTokens,
    { message: '--min-tokens must not exceed --max-tokens', path: ['minTokens'] }
  );

export type ChunkOptionsInput = z.input<typeof ChunkOptionsSchema>;
export type ChunkOptions = z.output<typeof ChunkOptionsSchema>;

export const ChunkArgsSchema = z.object({
  files: z.array(z.string().min(1, 'File path cannot be empty')).min(1, 'At least one file is required'),
});

// ============================================================================
// BOUNDARIES COMMAND SCHEMA
// ============================================================================

export const BoundariesOptionsSchema = z
  .object({
    from: integerOption('--from', 1),
    to: integerOption('--to', 1),
  })
  .refine(
    (options) => options.from === undefined || options.to === undefined || options.from <= options.to,
    { message: '--from must not be after --to', path: ['from'] }
  );

export type BoundariesOptionsInput = z.input<typeof BoundariesOptionsSchema>;
export type BoundariesOptions = z.output<typeof BoundariesOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(ChunkOptionsSchema, cmdOptions);
 * if (!result.success) {
 *   ctx.error(result.error);
 *   process.exitCode = 1;
 *   return;
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string; issues: string[] } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  // Format Zod errors into a readable message
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return { success: false, error: `Validation failed:\n  ${issues.join('\n  ')}`, issues };
}

/**
 * validateInput(), throwing ValidationError on failure
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new ValidationError('Invalid command options', result.issues);
  }
  return result.data;
}
