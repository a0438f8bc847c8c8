import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Address } from "viem";
import { isMarketError, type MarketErrorKind } from "../engine/errors.js";
import type { Market } from "../engine/market.js";
import type { MarketRegistry } from "../engine/registry.js";
import {
  buyBodySchema,
  callerHeaderSchema,
  feeQuerySchema,
  fundBodySchema,
  marketAddressParamsSchema,
  sellBodySchema,
} from "../schemas/market.schema.js";

const STATUS_BY_KIND: Record<MarketErrorKind, number> = {
  InvalidConstruction: 422,
  Unauthorized: 403,
  TransferFailure: 422,
  NonPositiveAmount: 422,
  SlippageExceeded: 409,
  ArithmeticOverflow: 422,
  InvalidOutcomeIndex: 400,
  MarketNotFound: 404,
  ReentrantCall: 409,
};

/** Map market errors to HTTP responses; anything else goes to Fastify's error handler. */
function sendMarketError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!isMarketError(err)) throw err;
  return reply.code(STATUS_BY_KIND[err.kind]).send({ error: err.kind, message: err.message });
}

function resolveMarket(registry: MarketRegistry, params: unknown, reply: FastifyReply): Market | null {
  const parsed = marketAddressParamsSchema.safeParse(params);
  if (!parsed.success) {
    reply.code(400).send({ error: "Invalid market address" });
    return null;
  }
  try {
    return registry.get(parsed.data.address);
  } catch (err) {
    sendMarketError(reply, err);
    return null;
  }
}

function resolveCaller(headers: unknown, reply: FastifyReply): Address | null {
  const parsed = callerHeaderSchema.safeParse(headers);
  if (!parsed.success) {
    reply.code(401).send({ error: "x-caller-address header with a valid address is required" });
    return null;
  }
  return parsed.data["x-caller-address"];
}

export async function registerMarketRoutes(app: FastifyInstance, registry: MarketRegistry): Promise<void> {
  /** GET /api/markets - Snapshots of every registered market. */
  app.get("/api/markets", async (_req: FastifyRequest, reply: FastifyReply) => {
    const data = registry.list().map((m) => m.snapshot());
    return reply.send({ data, count: data.length });
  });

  /** GET /api/markets/:address - One market snapshot. */
  app.get("/api/markets/:address", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    return reply.send(market.snapshot());
  });

  /** GET /api/markets/:address/fee?amount= - Fee the market charges on a gross amount. */
  app.get("/api/markets/:address/fee", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const parsed = feeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    try {
      const fee = market.calcMarketFee(parsed.data.amount);
      return reply.send({ amount: parsed.data.amount.toString(), fee: fee.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/fund - Creator adds collateral. Body: { amount }. */
  app.post("/api/markets/:address/fund", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    const parsed = fundBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    try {
      market.fund(caller, parsed.data.amount);
      return reply.send({ funding: market.funding.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/buy - Body: { outcomeIndex, count, maxCost }. */
  app.post("/api/markets/:address/buy", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    const parsed = buyBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const { outcomeIndex, count, maxCost } = parsed.data;
    try {
      const cost = market.buy(caller, outcomeIndex, count, maxCost);
      req.log.info({ market: market.address, caller, outcomeIndex, count: count.toString(), cost: cost.toString() }, "buy");
      return reply.send({ cost: cost.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/sell - Body: { outcomeIndex, count, minProfit }. */
  app.post("/api/markets/:address/sell", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    const parsed = sellBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const { outcomeIndex, count, minProfit } = parsed.data;
    try {
      const profit = market.sell(caller, outcomeIndex, count, minProfit);
      req.log.info({ market: market.address, caller, outcomeIndex, count: count.toString(), profit: profit.toString() }, "sell");
      return reply.send({ profit: profit.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/short-sell - Body: { outcomeIndex, count, minProfit }. */
  app.post("/api/markets/:address/short-sell", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    const parsed = sellBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const { outcomeIndex, count, minProfit } = parsed.data;
    try {
      const cost = market.shortSell(caller, outcomeIndex, count, minProfit);
      req.log.info({ market: market.address, caller, outcomeIndex, count: count.toString(), cost: cost.toString() }, "short sell");
      return reply.send({ cost: cost.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/close - Creator takes every outcome token the market holds. */
  app.post("/api/markets/:address/close", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    try {
      const amounts = market.close(caller);
      return reply.send({ amounts: amounts.map((a) => a.toString()) });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });

  /** POST /api/markets/:address/withdraw-fees - Creator takes the market's collateral balance. */
  app.post("/api/markets/:address/withdraw-fees", async (req: FastifyRequest, reply: FastifyReply) => {
    const market = resolveMarket(registry, req.params, reply);
    if (!market) return reply;
    const caller = resolveCaller(req.headers, reply);
    if (!caller) return reply;
    try {
      const amount = market.withdrawFees(caller);
      return reply.send({ amount: amount.toString() });
    } catch (err) {
      return sendMarketError(reply, err);
    }
  });
}
