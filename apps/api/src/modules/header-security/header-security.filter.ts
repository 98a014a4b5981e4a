import { pino, type Logger } from "pino";
import type { HeaderSecurityOptions } from "@secure-headers/shared-types";
import { FRAME_OPTIONS, type FrameOption } from "./frame-option.js";
import {
  HEADER_NAMES,
  HeaderSecurityLifecycleError,
  ResponseCommittedError,
  type FilterChain,
  type HeaderResponse,
  type SecureRequest,
} from "./header-security.interface.js";
import {
  parseHeaderSecurityOptions,
  type HeaderSecurityConfig,
} from "./header-security.schema.js";

/** The filter only logs at these levels; any pino or Fastify logger fits. */
export type FilterLogger = Pick<Logger, "debug" | "error">;

interface CompiledHeaders {
  config: HeaderSecurityConfig;
  hstsHeaderValue: string;
  antiClickJackingHeaderValue: string;
}

/**
 * `max-age=<N>`, followed by `;includeSubDomains` when enabled.
 */
export function buildHstsHeaderValue(config: HeaderSecurityConfig): string {
  let value = `max-age=${config.hstsMaxAgeSeconds}`;
  if (config.hstsIncludeSubDomains) {
    value += ";includeSubDomains";
  }
  return value;
}

/**
 * The option's wire token; ALLOW-FROM carries `:<uri>`.
 */
export function buildAntiClickJackingHeaderValue(
  config: HeaderSecurityConfig,
): string {
  const token = FRAME_OPTIONS[config.antiClickJackingOption];
  if (config.antiClickJackingOption === "ALLOW_FROM") {
    return `${token}:${config.antiClickJackingUri ?? ""}`;
  }
  return token;
}

/**
 * Adds HSTS and clickjacking protection headers to every response.
 *
 * Lifecycle: construct, call `init` exactly once, then call `process` for
 * each request. Header values are compiled in `init` and never recomputed, so
 * `process` only reads immutable state and may run concurrently.
 */
export class HeaderSecurityFilter {
  private compiled: CompiledHeaders | null = null;

  constructor(
    private readonly logger: FilterLogger = pino({ level: "silent" }),
  ) {}

  /**
   * Binds the configuration and compiles both header values.
   *
   * @throws {HeaderSecurityConfigError} on any invalid option. Fatal: the
   *   caller must abort startup.
   * @throws {HeaderSecurityLifecycleError} if already initialized.
   */
  init(
    options: HeaderSecurityOptions | Readonly<Record<string, unknown>> = {},
  ): void {
    if (this.compiled) {
      throw new HeaderSecurityLifecycleError(
        "HeaderSecurityFilter.init() must be called only once.",
      );
    }

    const config = parseHeaderSecurityOptions(options);
    this.compiled = Object.freeze({
      config: Object.freeze(config),
      hstsHeaderValue: buildHstsHeaderValue(config),
      antiClickJackingHeaderValue: buildAntiClickJackingHeaderValue(config),
    });

    this.logger.debug(
      {
        hstsEnabled: config.hstsEnabled,
        hsts: this.compiled.hstsHeaderValue,
        antiClickJackingEnabled: config.antiClickJackingEnabled,
        frameOptions: this.compiled.antiClickJackingHeaderValue,
      },
      "header security filter initialized",
    );
  }

  /**
   * Appends the enabled security headers, then hands over to `next`.
   * Existing header values are never replaced or removed.
   *
   * @returns whatever `next` returns, so an async chain can be awaited.
   * @throws {ResponseCommittedError} if the response was already committed;
   *   `next` is not called.
   */
  process<T>(
    request: SecureRequest,
    response: HeaderResponse,
    next: FilterChain<T>,
  ): T {
    const { config, hstsHeaderValue, antiClickJackingHeaderValue } =
      this.requireCompiled();

    if (response.isCommitted()) {
      const err = new ResponseCommittedError();
      this.logger.error({ err }, err.message);
      throw err;
    }

    const supportsHeaders = response.supportsHeaders();

    if (config.hstsEnabled && request.isSecure() && supportsHeaders) {
      response.addHeader(HEADER_NAMES.HSTS, hstsHeaderValue);
    }

    if (config.antiClickJackingEnabled && supportsHeaders) {
      response.addHeader(
        HEADER_NAMES.FRAME_OPTIONS,
        antiClickJackingHeaderValue,
      );
    }

    return next();
  }

  get isInitialized(): boolean {
    return this.compiled !== null;
  }

  /** Effective configuration bound during `init`. */
  get config(): Readonly<HeaderSecurityConfig> {
    return this.requireCompiled().config;
  }

  get hstsHeaderValue(): string {
    return this.requireCompiled().hstsHeaderValue;
  }

  get antiClickJackingHeaderValue(): string {
    return this.requireCompiled().antiClickJackingHeaderValue;
  }

  get antiClickJackingOption(): FrameOption {
    return this.requireCompiled().config.antiClickJackingOption;
  }

  get antiClickJackingUri(): string | null {
    return this.requireCompiled().config.antiClickJackingUri;
  }

  private requireCompiled(): CompiledHeaders {
    if (!this.compiled) {
      throw new HeaderSecurityLifecycleError(
        "HeaderSecurityFilter used before init().",
      );
    }
    return this.compiled;
  }
}
