/**
 * JSON Utilities
 */

import type { z } from 'zod';

/**
 * Parse JSON and validate it against a schema, returning `fallback` when the
 * text is missing, malformed, or has the wrong shape.
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {});
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: z.ZodType<T>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    onError?.(new Error(parsed.error.message), json);
    return fallback;
  }
  return parsed.data;
}
