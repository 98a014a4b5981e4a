import fp from "fastify-plugin";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { HeaderSecurityOptions } from "@secure-headers/shared-types";
import { HeaderSecurityFilter } from "../modules/header-security/header-security.filter.js";
import type {
  HeaderResponse,
  SecureRequest,
} from "../modules/header-security/header-security.interface.js";
import { loadHeaderSecurityOptionsFromEnv } from "../modules/header-security/header-security.schema.js";

export interface SecurityHeadersPluginOptions extends HeaderSecurityOptions {
  /** Environment to bind from. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

// Consumed by fastify.register() itself, not filter configuration.
const REGISTER_OPTION_KEYS = new Set(["prefix", "logLevel", "logSerializers"]);

function toSecureRequest(request: FastifyRequest): SecureRequest {
  // request.protocol honours X-Forwarded-Proto when trustProxy is set.
  return { isSecure: () => request.protocol === "https" };
}

function toHeaderResponse(reply: FastifyReply): HeaderResponse {
  return {
    isCommitted: () => reply.sent || reply.raw.headersSent,
    supportsHeaders: () => true,
    addHeader: (name, value) => {
      const existing = reply.getHeader(name);
      if (existing === undefined) {
        reply.header(name, value);
        return;
      }
      const values = Array.isArray(existing) ? existing : [String(existing)];
      reply.header(name, [...values, value]);
    },
  };
}

/**
 * Runs the HeaderSecurityFilter in front of every route.
 *
 * Headers:
 *   - Strict-Transport-Security  → only on requests received over HTTPS
 *   - X-Frame-Options            → every response, unless disabled
 *
 * Configuration comes from the HSTS_* / ANTI_CLICKJACKING_* env vars, with
 * plugin options taking precedence. Unknown option keys are rejected. It is bound once, at registration: an
 * invalid value rejects `register()` so the server never starts serving
 * without its security headers.
 *
 * HTTPS termination usually happens at a reverse proxy. Build the app with
 * `trustProxy` so `X-Forwarded-Proto: https` marks the request as secure.
 */
async function securityHeadersPlugin(
  fastify: FastifyInstance,
  opts: SecurityHeadersPluginOptions,
): Promise<void> {
  const { env, ...explicit } = opts;
  const options: Record<string, unknown> = {
    ...loadHeaderSecurityOptionsFromEnv(env ?? process.env),
  };
  for (const [key, value] of Object.entries(explicit)) {
    if (value !== undefined && !REGISTER_OPTION_KEYS.has(key)) {
      options[key] = value;
    }
  }

  const filter = new HeaderSecurityFilter(
    fastify.log.child({ plugin: "security-headers" }),
  );

  try {
    filter.init(options);
  } catch (err) {
    fastify.log.fatal(
      { err },
      "Invalid header security configuration, refusing to start.",
    );
    throw err;
  }

  fastify.decorate("headerSecurity", filter);

  fastify.addHook("onRequest", (request, reply, done) => {
    let proceed = false;
    try {
      filter.process(toSecureRequest(request), toHeaderResponse(reply), () => {
        proceed = true;
      });
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    if (proceed) done();
  });
}

export default fp(securityHeadersPlugin, {
  name: "security-headers",
  fastify: "5.x",
});
