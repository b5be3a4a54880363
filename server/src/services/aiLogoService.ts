/**
 * AI logo generation (placeholder)
 *
 * Returns a fixed placeholder image and placement suggestions for the
 * storefront editor. No model is called.
 */

import type { AiLogoRequest, AiLogoResult, LogoPlacement } from '@jersey-studio/shared';

export const PLACEHOLDER_LOGO_URL = 'https://placehold.co/256x256/png?text=AI+Logo';

const SUGGESTED_POSITIONS: readonly LogoPlacement[] = [
    { area: 'front_center', x: 0.5, y: 0.25, w: 0.3 },
    { area: 'chest_left', x: 0.28, y: 0.22, w: 0.18 },
    { area: 'sleeve_right', x: 0.82, y: 0.35, w: 0.2 },
];

export function generateLogo(_request: AiLogoRequest): AiLogoResult {
    return {
        logo_url: PLACEHOLDER_LOGO_URL,
        suggested_positions: SUGGESTED_POSITIONS.map(position => ({ ...position })),
    };
}
