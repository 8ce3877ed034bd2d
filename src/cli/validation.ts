/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings; these schemas coerce them,
 * apply defaults and produce readable error messages.
 */

import { z } from 'zod';

// ============================================================================
// INDEX COMMAND SCHEMA
// ============================================================================

export const IndexOptionsSchema = z.object({
  /** "py, .TS,js" → ['py', 'ts', 'js'] */
  extensions: z
    .string()
    .transform((val) =>
      val
        .split(',')
        .map((ext) => ext.trim().replace(/^\./, '').toLowerCase())
        .filter(Boolean)
    )
    .optional(),
  dryRun: z.boolean().default(false),
  force: z.boolean().default(false),
});

export type IndexOptions = z.output<typeof IndexOptionsSchema>;

// ============================================================================
// ASK / CHAT COMMAND SCHEMA
// ============================================================================

export const ConversationOptionsSchema = z.object({
  conversation: z
    .string()
    .min(1, 'Conversation id cannot be empty')
    .max(200, 'Conversation id too long (max 200 chars)')
    .default('default'),
});

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(4000, 'Question too long (max 4000 chars)'),
});

// ============================================================================
// SERVE COMMAND SCHEMA
// ============================================================================

export const ServeOptionsSchema = z.object({
  port: z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isInteger(val) && val >= 0 && val <= 65535, {
      message: 'port must be an integer between 0 and 65535',
    })
    .optional(),
  host: z.string().min(1, 'host cannot be empty').optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(IndexOptionsSchema, options);
 * if (!result.success) {
 *   throw new ValidationError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}
