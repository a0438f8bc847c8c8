import Fastify, { type FastifyInstance } from "fastify";
import { config } from "./config/index.js";
import type { MarketRegistry } from "./engine/registry.js";
import { registerMarketRoutes } from "./routes/markets.routes.js";

export interface BuildAppOptions {
  registry: MarketRegistry;
}

/** Fastify app exposing the markets of a registry over HTTP. Call `listen` to serve it. */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: { level: config.logLevel } });
  await registerMarketRoutes(fastify, options.registry);
  return fastify;
}
