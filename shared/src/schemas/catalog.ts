/**
 * Catalog schemas: jersey templates and pricing tiers
 */

import { z } from 'zod';
import { hexColorSchema, sportSchema } from './common.js';

// ============================================
// PRICING TIER
// ============================================

export const PricingTierSchema = z.object({
  /** Tier name e.g. Starter, Pro, Elite */
  name: z.string({ required_error: 'Tier name is required' }),
  /** Base price per jersey */
  base_price: z.number().nonnegative('Base price cannot be negative'),
  /** Minimum quantity for this tier */
  min_quantity: z.number().int().min(1, 'Minimum quantity must be at least 1').default(1),
  features: z.array(z.string()).default([]),
});

export type PricingTier = z.infer<typeof PricingTierSchema>;
export type PricingTierInput = z.input<typeof PricingTierSchema>;

// ============================================
// JERSEY TEMPLATE
// ============================================

export const DEFAULT_TEMPLATE_COLORS = ['#0A66C2', '#FF6F00'] as const;

export const JerseyTemplateSchema = z.object({
  sport: sportSchema,
  name: z.string(),
  /** Primary accent colors */
  colors: z.array(hexColorSchema).default(() => [...DEFAULT_TEMPLATE_COLORS]),
  preview_url: z.string().nullish(),
  /** Optional SVG template markup */
  svg: z.string().nullish(),
  /** Visible in catalog */
  is_public: z.boolean().default(true),
});

export type JerseyTemplate = z.infer<typeof JerseyTemplateSchema>;
export type JerseyTemplateInput = z.input<typeof JerseyTemplateSchema>;
