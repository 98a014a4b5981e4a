import type { HeaderSecurityFilter } from "../modules/header-security/header-security.filter.js";

declare module "fastify" {
  interface FastifyInstance {
    /**
     * The initialized header security filter. Registered by the
     * security-headers plugin; read-only after startup.
     */
    headerSecurity: HeaderSecurityFilter;
  }
}
