import Fastify from "fastify";
import sensiblePlugin from "./plugins/sensible.plugin.js";
import securityHeadersPlugin, {
  type SecurityHeadersPluginOptions,
} from "./plugins/security-headers.plugin.js";

export interface BuildAppOptions {
  /** Overrides TRUST_PROXY. */
  trustProxy?: boolean;
  securityHeaders?: SecurityHeadersPluginOptions;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const loggerOptions =
    process.env["NODE_ENV"] === "test"
      ? (false as const)
      : process.env["NODE_ENV"] === "development"
        ? ({
            level: process.env["LOG_LEVEL"] ?? "info",
            transport: { target: "pino-pretty" },
          } as const)
        : ({
            level: process.env["LOG_LEVEL"] ?? "info",
          } as const);

  const fastify = Fastify({
    logger: loggerOptions,
    trustProxy: options.trustProxy ?? process.env["TRUST_PROXY"] === "true",
  });

  await fastify.register(securityHeadersPlugin, options.securityHeaders ?? {});
  await fastify.register(sensiblePlugin);

  fastify.get("/health", async (_request, _reply) => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  return fastify;
}
