/**
 * Database Row Validation
 *
 * Zod schemas for rows read back from SQLite, so schema drift surfaces as a
 * DatabaseError with details instead of undefined fields deep in the code.
 *
 * ```ts
 * const rows = db.prepare('SELECT * FROM chunks').all();
 * const chunks = validateRows(ChunkRowSchema, rows, 'chunks');
 * ```
 */

import { z, type ZodIssue } from 'zod';

import { CLIError } from '../errors/types.js';

export const ChunkRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  // better-sqlite3 returns BLOBs as Buffers
  embedding: z.instanceof(Buffer),
  metadata: z.string(),
  created_at: z.string(),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

export const IndexMetaRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export type IndexMetaRow = z.infer<typeof IndexMetaRowSchema>;

/**
 * A row did not match its schema. Exit code 5, like DatabaseError.
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more = issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '';

    super(
      message,
      `Schema validation failed:\n${summary}${more}\n\nRebuild the index with: cbi index --force`,
      5
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * Validate one row.
 *
 * @param context - Where the row came from, for the error message
 * @throws SchemaValidationError
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.infer<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new SchemaValidationError(`Invalid row in ${context}`, result.error.issues);
  }
  return result.data;
}

/**
 * Validate every row of a result set.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.infer<T>> {
  return rows.map((row, index) => validateRow(schema, row, `${context}[${index}]`));
}
