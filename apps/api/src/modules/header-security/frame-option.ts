import type { FrameOptionToken } from "@secure-headers/shared-types";

/**
 * `X-Frame-Options` variants, each mapped to the token written on the wire.
 */
export const FRAME_OPTIONS = {
  DENY: "DENY",
  SAME_ORIGIN: "SAMEORIGIN",
  ALLOW_FROM: "ALLOW-FROM",
} as const satisfies Record<string, FrameOptionToken>;

export type FrameOption = keyof typeof FRAME_OPTIONS;

/**
 * Resolves a configured token (e.g. "sameorigin") to its variant.
 * Matching is case-insensitive and ignores surrounding whitespace.
 *
 * Returns null when the token matches no variant.
 */
export function frameOptionFromToken(token: string): FrameOption | null {
  const wanted = token.trim().toUpperCase();
  for (const [option, headerToken] of Object.entries(FRAME_OPTIONS)) {
    if (headerToken === wanted && isFrameOption(option)) {
      return option;
    }
  }
  return null;
}

function isFrameOption(value: string): value is FrameOption {
  return Object.prototype.hasOwnProperty.call(FRAME_OPTIONS, value);
}
