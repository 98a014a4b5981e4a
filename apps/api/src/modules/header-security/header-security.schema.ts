import { z } from "zod";
import type { HeaderSecurityOptions } from "@secure-headers/shared-types";
import { frameOptionFromToken, type FrameOption } from "./frame-option.js";
import { HeaderSecurityConfigError } from "./header-security.interface.js";

const BooleanInputSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false"]))
    .transform((v) => v === "true"),
]);

// Negative max-age is clamped, never rejected.
const MaxAgeInputSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^[+-]?\d+$/, "must be an integer number of seconds")
      .transform(Number),
  ])
  .pipe(z.number().int("must be an integer number of seconds").safe())
  .transform((seconds) => Math.max(0, seconds));

const FrameOptionInputSchema = z.string().transform((token, ctx) => {
  const option = frameOptionFromToken(token);
  if (!option) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unrecognized frame option "${token}" (expected DENY, SAMEORIGIN or ALLOW-FROM)`,
    });
    return z.NEVER;
  }
  return option;
});

export interface HeaderSecurityConfig {
  hstsEnabled: boolean;
  hstsMaxAgeSeconds: number;
  hstsIncludeSubDomains: boolean;
  antiClickJackingEnabled: boolean;
  antiClickJackingOption: FrameOption;
  /** Non-null if and only if the option is ALLOW_FROM. */
  antiClickJackingUri: string | null;
}

export const HeaderSecurityOptionsSchema = z
  .object({
    hstsEnabled: BooleanInputSchema.default(true),
    hstsMaxAgeSeconds: MaxAgeInputSchema.default(0),
    hstsIncludeSubDomains: BooleanInputSchema.default(false),
    antiClickJackingEnabled: BooleanInputSchema.default(true),
    antiClickJackingOption: FrameOptionInputSchema.default("DENY"),
    antiClickJackingUri: z.string().optional(),
  })
  .strict()
  .transform((raw, ctx): HeaderSecurityConfig => {
    let uri: string | null = null;

    if (raw.antiClickJackingOption === "ALLOW_FROM") {
      const candidate = raw.antiClickJackingUri?.trim() ?? "";
      if (candidate === "") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["antiClickJackingUri"],
          message: "required when antiClickJackingOption is ALLOW-FROM",
        });
        return z.NEVER;
      }
      if (!isParsableUri(candidate)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["antiClickJackingUri"],
          message: `"${candidate}" is not a valid absolute URI`,
        });
        return z.NEVER;
      }
      uri = candidate;
    }

    return {
      hstsEnabled: raw.hstsEnabled,
      hstsMaxAgeSeconds: raw.hstsMaxAgeSeconds,
      hstsIncludeSubDomains: raw.hstsIncludeSubDomains,
      antiClickJackingEnabled: raw.antiClickJackingEnabled,
      antiClickJackingOption: raw.antiClickJackingOption,
      antiClickJackingUri: uri,
    };
  });

// URL parsing strips tabs and newlines and encodes spaces, so those are
// rejected up front: the header carries the configured string as is.
const UNSAFE_URI_CHARS = /[\s\u0000-\u001f\u007f]/;

function isParsableUri(value: string): boolean {
  return !UNSAFE_URI_CHARS.test(value) && URL.canParse(value);
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Binds raw options into an effective configuration.
 *
 * @throws {HeaderSecurityConfigError} listing every rejected key.
 */
export function parseHeaderSecurityOptions(
  options: HeaderSecurityOptions | Readonly<Record<string, unknown>>,
): HeaderSecurityConfig {
  const result = HeaderSecurityOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new HeaderSecurityConfigError(
      `Invalid header security configuration: ${issues.join("; ")}`,
      issues,
      { cause: result.error },
    );
  }
  return result.data;
}

const ENV_BINDINGS = {
  HSTS_ENABLED: "hstsEnabled",
  HSTS_MAX_AGE_SECONDS: "hstsMaxAgeSeconds",
  HSTS_INCLUDE_SUBDOMAINS: "hstsIncludeSubDomains",
  ANTI_CLICKJACKING_ENABLED: "antiClickJackingEnabled",
  ANTI_CLICKJACKING_OPTION: "antiClickJackingOption",
  ANTI_CLICKJACKING_URI: "antiClickJackingUri",
} as const satisfies Record<string, keyof HeaderSecurityOptions>;

/**
 * Reads filter options from environment variables. Unset or blank variables
 * are left out so the defaults apply.
 */
export function loadHeaderSecurityOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): HeaderSecurityOptions {
  const options: HeaderSecurityOptions = {};
  for (const [variable, key] of Object.entries(ENV_BINDINGS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== "") {
      options[key] = value;
    }
  }
  return options;
}
