import { z } from 'zod';

export const AiLogoRequestSchema = z.object({
  prompt: z.string({ required_error: 'prompt is required' }).min(1, 'prompt is required'),
  /** Absent means sporty; an explicit null is kept */
  style: z.string().nullish().default('sporty'),
});

export type AiLogoRequest = z.infer<typeof AiLogoRequestSchema>;

export interface LogoPlacement {
  area: string;
  /** Horizontal center, as a fraction of jersey width */
  x: number;
  /** Vertical center, as a fraction of jersey height */
  y: number;
  /** Logo width, as a fraction of jersey width */
  w: number;
}

export interface AiLogoResult {
  logo_url: string;
  suggested_positions: LogoPlacement[];
}
