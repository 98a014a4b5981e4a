import type { SecurityHeaderName } from "@secure-headers/shared-types";

/**
 * Framework-agnostic seams of the header security filter.
 *
 * The filter never sees a Fastify request or reply: the plugin adapts them
 * into these capabilities (see plugins/security-headers.plugin.ts).
 */

export const HEADER_NAMES = {
  HSTS: "Strict-Transport-Security",
  FRAME_OPTIONS: "X-Frame-Options",
} as const satisfies Record<string, SecurityHeaderName>;

export interface SecureRequest {
  /** True when the request arrived over an encrypted transport (TLS). */
  isSecure(): boolean;
}

export interface HeaderResponse {
  /** True once headers have been flushed to the client. */
  isCommitted(): boolean;
  /** False for responses that carry no HTTP headers. */
  supportsHeaders(): boolean;
  /**
   * Appends a header value. An existing value under the same name is kept
   * and the new one is added next to it.
   */
  addHeader(name: string, value: string): void;
}

/** Next stage of the processing chain. */
export type FilterChain<T = void> = () => T;

/**
 * Thrown by `init` when the configuration cannot produce valid header values.
 * Always fatal: the owning application must not start serving traffic.
 */
export class HeaderSecurityConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HeaderSecurityConfigError";
  }
}

/**
 * Thrown by `process` when the response was committed before the filter ran.
 * Signals a misordered pipeline, not a per-request condition.
 */
export class ResponseCommittedError extends Error {
  public readonly statusCode = 500;

  constructor() {
    super(
      "Response was already committed before the header security filter ran; " +
        "security headers can no longer be added.",
    );
    this.name = "ResponseCommittedError";
  }
}

/** Thrown when the filter is used outside its uninitialized → ready lifecycle. */
export class HeaderSecurityLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HeaderSecurityLifecycleError";
  }
}
