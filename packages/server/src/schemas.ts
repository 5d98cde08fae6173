import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '@billvault/core';

const Id = z.string().min(1).max(128).regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"');

export const DocumentParams = z.object({
  companyId: Id,
  documentId: Id,
});

// ── PDF generation ──

export const GeneratePdfBody = z.object({
  templateId: z.string().min(1).optional(),
  /** Regenerate a historical snapshot */
  snapshotId: z.string().min(1).optional(),
});

export const PreviewQuery = z.object({
  templateId: z.string().min(1).optional(),
});

// ── Lifecycle ──

export const SendBody = z.object({
  recipient: z.string().email().optional(),
});

export const PaymentBody = z.object({
  amount: z.union([z.string().min(1), z.number().finite()]),
});

export const LifecycleQuery = z.object({
  since: z.string().datetime().optional(),
});

// ── Maintenance ──

export const SweepBody = z.object({
  dryRun: z.boolean().optional(),
});

/** Parse with a schema, raising the core ValidationError on failure. */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  message = 'Invalid request',
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** JSON body of a request; an empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  return text.trim() ? JSON.parse(text) : {};
}
