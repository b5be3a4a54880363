/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';

// Store-assigned identifier: a MongoDB ObjectId in its 24-char hex form
export const objectIdSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{24}$/, 'Invalid id: expected a 24-character hex string');

export const hexColorSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Invalid hex color');

export const sportSchema = z.enum([
  'cricket',
  'football',
  'basketball',
  'kabaddi',
  'hockey',
  'badminton',
]);

export const jerseySizeSchema = z.enum(['XS', 'S', 'M', 'L', 'XL', 'XXL']);

// Confirmed → In Production → QC → Shipped
export const orderStatusSchema = z.enum(['Confirmed', 'In Production', 'QC', 'Shipped']);

export const orderPaymentStatusSchema = z.enum(['pending', 'paid', 'failed']);

export const paymentMethodSchema = z.enum(['upi', 'card', 'netbanking']);

export const paymentIntentStatusSchema = z.enum(['created', 'processing', 'paid', 'failed']);

export const adminRoleSchema = z.enum(['admin', 'manager']);

export type Sport = z.infer<typeof sportSchema>;
export type JerseySize = z.infer<typeof jerseySizeSchema>;
export type OrderStatus = z.infer<typeof orderStatusSchema>;
export type OrderPaymentStatus = z.infer<typeof orderPaymentStatusSchema>;
export type PaymentMethod = z.infer<typeof paymentMethodSchema>;
export type PaymentIntentStatus = z.infer<typeof paymentIntentStatusSchema>;

export const ObjectIdParamSchema = z.object({
  id: objectIdSchema,
});

// ============================================
// JSON VALUES
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const jsonPrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([jsonPrimitiveSchema, z.array(jsonValueSchema), z.record(z.string(), jsonValueSchema)])
);

/** Deepest container nesting accepted in a JSON object, the object itself included */
export const MAX_JSON_DEPTH = 32;

function exceedsDepth(value: unknown, remaining: number): boolean {
  if (value === null || typeof value !== 'object') return false;
  if (remaining === 0) return true;
  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  return children.some(child => exceedsDepth(child, remaining - 1));
}

// Depth is checked before the recursive parse so that deep input fails as an issue
export const jsonObjectSchema: z.ZodType<JsonObject, z.ZodTypeDef, unknown> = z
  .unknown()
  .superRefine((value, ctx) => {
    if (exceedsDepth(value, MAX_JSON_DEPTH)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Nesting exceeds ${MAX_JSON_DEPTH} levels`,
      });
    }
  })
  .pipe(z.record(z.string(), jsonValueSchema));
