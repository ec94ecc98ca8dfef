import type { FastifyInstance } from "fastify";
import { registerQueryRoutes, type QueryRoutesDependencies } from "./query.js";

export interface ApiRoutesDependencies {
  query?: QueryRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerQueryRoutes(app, dependencies?.query);
}
