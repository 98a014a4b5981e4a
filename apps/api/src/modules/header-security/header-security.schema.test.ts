import { describe, it, expect } from "vitest";
import {
  loadHeaderSecurityOptionsFromEnv,
  parseHeaderSecurityOptions,
} from "./header-security.schema.js";
import { HeaderSecurityConfigError } from "./header-security.interface.js";

function issuesFor(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (err) {
    if (err instanceof HeaderSecurityConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a HeaderSecurityConfigError");
}

describe("parseHeaderSecurityOptions", () => {
  it("binds string inputs the same as typed inputs", () => {
    expect(
      parseHeaderSecurityOptions({
        hstsEnabled: "FALSE",
        hstsMaxAgeSeconds: " 86400 ",
        hstsIncludeSubDomains: "true",
        antiClickJackingEnabled: "True",
        antiClickJackingOption: "sameorigin",
      }),
    ).toEqual({
      hstsEnabled: false,
      hstsMaxAgeSeconds: 86400,
      hstsIncludeSubDomains: true,
      antiClickJackingEnabled: true,
      antiClickJackingOption: "SAME_ORIGIN",
      antiClickJackingUri: null,
    });
  });

  it("clamps negative max-age to 0", () => {
    expect(
      parseHeaderSecurityOptions({ hstsMaxAgeSeconds: -5 }).hstsMaxAgeSeconds,
    ).toBe(0);
  });

  it("trims the ALLOW-FROM URI", () => {
    expect(
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "  https://embedder.test  ",
      }).antiClickJackingUri,
    ).toBe("https://embedder.test");
  });

  it("rejects a non-integer max-age", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({ hstsMaxAgeSeconds: 1.5 }),
    );
    expect(issues).toEqual([
      "hstsMaxAgeSeconds: must be an integer number of seconds",
    ]);
  });

  it("rejects a non-numeric max-age string", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({ hstsMaxAgeSeconds: "one year" }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^hstsMaxAgeSeconds: /);
  });

  it("rejects a boolean flag that is neither true nor false", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({ hstsEnabled: "yes" }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^hstsEnabled: /);
  });

  it("reports a missing ALLOW-FROM URI against the URI key", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({ antiClickJackingOption: "ALLOW-FROM" }),
    );
    expect(issues).toEqual([
      "antiClickJackingUri: required when antiClickJackingOption is ALLOW-FROM",
    ]);
  });

  it("reports a blank ALLOW-FROM URI as missing", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "   ",
      }),
    );
    expect(issues).toEqual([
      "antiClickJackingUri: required when antiClickJackingOption is ALLOW-FROM",
    ]);
  });

  it("rejects a relative ALLOW-FROM URI", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "/embed",
      }),
    );
    expect(issues).toEqual([
      'antiClickJackingUri: "/embed" is not a valid absolute URI',
    ]);
  });

  it("rejects an ALLOW-FROM URI with an interior newline", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "https://a.te\nst",
      }),
    );
    expect(issues).toEqual([
      'antiClickJackingUri: "https://a.te\nst" is not a valid absolute URI',
    ]);
  });

  it("rejects an ALLOW-FROM URI with an interior space", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "https://a.test/x y",
      }),
    );
    expect(issues).toEqual([
      'antiClickJackingUri: "https://a.test/x y" is not a valid absolute URI',
    ]);
  });

  it("rejects an ALLOW-FROM URI with a control character", () => {
    const issues = issuesFor(() =>
      parseHeaderSecurityOptions({
        antiClickJackingOption: "ALLOW-FROM",
        antiClickJackingUri: "https://a.test/\u0007",
      }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^antiClickJackingUri: /);
  });

  it("rejects unknown keys", () => {
    const options = { hstsEnabled: true, hstsPreload: true };

    const issues = issuesFor(() => parseHeaderSecurityOptions(options));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toContain("hstsPreload");
  });
});

describe("loadHeaderSecurityOptionsFromEnv", () => {
  it("maps the known variables onto option keys", () => {
    expect(
      loadHeaderSecurityOptionsFromEnv({
        HSTS_ENABLED: "true",
        HSTS_MAX_AGE_SECONDS: "31536000",
        HSTS_INCLUDE_SUBDOMAINS: "true",
        ANTI_CLICKJACKING_ENABLED: "false",
        ANTI_CLICKJACKING_OPTION: "ALLOW-FROM",
        ANTI_CLICKJACKING_URI: "https://embedder.test",
        UNRELATED: "ignored",
      }),
    ).toEqual({
      hstsEnabled: "true",
      hstsMaxAgeSeconds: "31536000",
      hstsIncludeSubDomains: "true",
      antiClickJackingEnabled: "false",
      antiClickJackingOption: "ALLOW-FROM",
      antiClickJackingUri: "https://embedder.test",
    });
  });

  it("leaves out unset and blank variables", () => {
    expect(
      loadHeaderSecurityOptionsFromEnv({
        HSTS_MAX_AGE_SECONDS: "",
        ANTI_CLICKJACKING_OPTION: "  ",
      }),
    ).toEqual({});
  });
});
