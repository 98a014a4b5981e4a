export type SecurityHeaderName = "Strict-Transport-Security" | "X-Frame-Options";

/** Wire tokens accepted by `X-Frame-Options`. */
export type FrameOptionToken = "DENY" | "SAMEORIGIN" | "ALLOW-FROM";

/**
 * Raw configuration surface of the header security filter.
 *
 * Values may arrive typed (plugin options) or as strings (environment
 * variables, init parameters); the filter binds and validates both at init.
 */
export interface HeaderSecurityOptions {
  hstsEnabled?: boolean | string;
  /** Negative values are clamped to 0. */
  hstsMaxAgeSeconds?: number | string;
  hstsIncludeSubDomains?: boolean | string;
  antiClickJackingEnabled?: boolean | string;
  /** Matched case-insensitively against {@link FrameOptionToken}. */
  antiClickJackingOption?: string;
  /** Required when the option is `ALLOW-FROM`, ignored otherwise. */
  antiClickJackingUri?: string;
}
