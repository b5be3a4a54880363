/**
 * Order-related validation schemas
 *
 * Design layers (text_elements / logo_elements) are positioned by the
 * storefront editor. Their keys are not fixed, so each layer is stored as a
 * JSON object and only its structure is checked.
 */

import { z } from 'zod';
import { DEFAULT_ORDER_LIST_LIMIT } from '../domain/constants.js';
import {
  hexColorSchema,
  jsonObjectSchema,
  objectIdSchema,
  orderPaymentStatusSchema,
  orderStatusSchema,
  paymentMethodSchema,
} from './common.js';

// ============================================
// JERSEY DESIGN
// ============================================

export const DEFAULT_JERSEY_COLOR = '#0A66C2';
// saffron
export const DEFAULT_ACCENT_COLOR = '#FF6F00';

export const DesignLayerSchema = jsonObjectSchema;

export const JerseyDesignSchema = z.object({
  front_color: hexColorSchema.default(DEFAULT_JERSEY_COLOR),
  back_color: hexColorSchema.default(DEFAULT_JERSEY_COLOR),
  accents: z.array(hexColorSchema).default(() => [DEFAULT_ACCENT_COLOR]),
  /** Draggable text layers */
  text_elements: z.array(DesignLayerSchema).default([]),
  /** Draggable logo layers */
  logo_elements: z.array(DesignLayerSchema).default([]),
});

export type DesignLayer = z.infer<typeof DesignLayerSchema>;
export type JerseyDesign = z.infer<typeof JerseyDesignSchema>;
export type JerseyDesignInput = z.input<typeof JerseyDesignSchema>;

// ============================================
// JERSEY ORDER
// ============================================

export const JerseyOrderSchema = z.object({
  customer_name: z.string(),
  customer_email: z.string(),
  customer_phone: z.string(),
  shipping_address: z.string(),
  team_id: z.string().nullish(),
  template_id: z.string().nullish(),
  design: JerseyDesignSchema,
  quantity: z.number().int().min(1, 'Quantity must be at least 1').default(1),
  /** Tier name resolved at checkout */
  pricing_tier: z.string().optional(),
  amount: z.number().nonnegative('Amount cannot be negative'),
  payment_status: orderPaymentStatusSchema.default('pending'),
  status: orderStatusSchema.default('Confirmed'),
});

export type JerseyOrder = z.infer<typeof JerseyOrderSchema>;

// ============================================
// REQUEST BODIES
// ============================================

export const CheckoutRequestSchema = z.object({
  customer_name: z.string({ required_error: 'customer_name is required' }),
  customer_email: z.string({ required_error: 'customer_email is required' }),
  customer_phone: z.string({ required_error: 'customer_phone is required' }),
  shipping_address: z.string({ required_error: 'shipping_address is required' }),
  team_id: z.string().nullish(),
  template_id: z.string().nullish(),
  design: JerseyDesignSchema,
  quantity: z.number().int('Quantity must be a whole number').min(1, 'Quantity must be at least 1'),
  method: paymentMethodSchema,
});

export type CheckoutRequest = z.infer<typeof CheckoutRequestSchema>;
export type CheckoutRequestInput = z.input<typeof CheckoutRequestSchema>;

export const UpdateOrderStatusSchema = z.object({
  status: orderStatusSchema,
});

export type UpdateOrderStatusInput = z.infer<typeof UpdateOrderStatusSchema>;

export const OrderIdParamSchema = z.object({
  order_id: objectIdSchema,
});

export const ListOrdersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1, 'limit must be at least 1').default(DEFAULT_ORDER_LIST_LIMIT),
});

export type ListOrdersQuery = z.infer<typeof ListOrdersQuerySchema>;
