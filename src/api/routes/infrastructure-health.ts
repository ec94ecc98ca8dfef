import type { FastifyInstance } from "fastify";
import { checkInfrastructureHealth, type ClientLifecycleModules } from "../../clients/lifecycle.js";

export interface InfrastructureHealthRouteOptions {
  loadClientModules?: () => Promise<ClientLifecycleModules>;
}

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  options?: InfrastructureHealthRouteOptions
): Promise<void> {
  app.get("/health/infrastructure", async (_request, reply) => {
    try {
      const clients = await checkInfrastructureHealth(options?.loadClientModules);
      const degraded = Object.values(clients).some((health) => health.status !== "ok");
      if (degraded) {
        reply.code(503);
      }
      return {
        status: degraded ? "degraded" : "ok",
        clients
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
