/**
 * Payment-related validation schemas
 */

import { z } from 'zod';
import { objectIdSchema, paymentIntentStatusSchema, paymentMethodSchema } from './common.js';

// ============================================
// PAYMENT INTENT
// ============================================

export const PaymentIntentSchema = z.object({
  order_id: z.string().nullish(),
  amount: z.number().nonnegative('Amount cannot be negative'),
  currency: z.string().default('INR'),
  method: paymentMethodSchema,
  status: paymentIntentStatusSchema.default('created'),
});

export type PaymentIntent = z.infer<typeof PaymentIntentSchema>;

// ============================================
// SIMULATED GATEWAY CALLBACK
// ============================================

export const UpdatePaymentStatusSchema = z.object({
  status: paymentIntentStatusSchema,
});

export type UpdatePaymentStatusInput = z.infer<typeof UpdatePaymentStatusSchema>;

export const PaymentIdParamSchema = z.object({
  payment_id: objectIdSchema,
});
