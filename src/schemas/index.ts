/**
 * Zod Validation Schemas
 *
 * Print documents arrive as untrusted JSON (files, HTTP bodies, queues).
 * They are validated here before any byte reaches the printer.
 */

import { z } from 'zod';
import { isSupportedEncoding } from '../printer/codec/transcoder';

// ==================================================================
// PRINT DOCUMENT SCHEMAS
// ==================================================================

export const PrintNodeSchema = z.object({
  name: z.string().min(1, 'Node name required'),
  options: z.record(z.string()).optional(),
  data: z.string().optional(),
});

export const PrintDocumentSchema = z.object({
  encoding: z
    .string()
    .refine((value) => isSupportedEncoding(value), { message: 'Unsupported encoding' })
    .optional(),
  nodes: z.array(PrintNodeSchema).max(10000, 'Too many nodes'),
});

export type PrintNodeInput = z.infer<typeof PrintNodeSchema>;
export type PrintDocument = z.infer<typeof PrintDocumentSchema>;

// ==================================================================
// VALIDATION HELPERS
// ==================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Validate without throwing
 */
export function safeValidate<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, error: `Validation failed: ${formatIssues(result.error)}` };
  }
}
