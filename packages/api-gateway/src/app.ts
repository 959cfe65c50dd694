import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { Redis } from "ioredis";

import type { Config } from "./config/index.js";
import type { GatewayServices } from "./services.js";
import { healthRoutes } from "./routes/health.routes.js";
import { statusRoutes } from "./routes/status.routes.js";
import { generateRoutes } from "./routes/generate.routes.js";
import { notesRoutes } from "./routes/notes.routes.js";

export async function buildApp(config: Config, services: GatewayServices) {
  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    trustProxy: true,
    bodyLimit: 256 * 1024,
    connectionTimeout: config.generationTimeoutMs * config.inferenceMaxAttempts + 10_000,
    keepAliveTimeout: 5_000,
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  // Swagger UI needs inline scripts outside production
  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
  });

  // Rate limiting — Redis if configured, otherwise in-memory
  let redisClient: Redis | null = null;
  if (config.redisUrl) {
    const { Redis } = await import("ioredis");
    const candidate = new Redis(config.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
    try {
      await candidate.connect();
      redisClient = candidate;
      fastify.log.info("Rate limiting: Redis");
    } catch (err) {
      candidate.disconnect();
      fastify.log.warn({ err }, "Redis unavailable — using in-memory rate limiting");
    }
  } else {
    fastify.log.info("Rate limiting: in-memory (REDIS_URL not set)");
  }

  await fastify.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    ...(redisClient ? { redis: redisClient } : {}),
    keyGenerator: (request) => `ip:${request.ip}`,
    // Thrown by the plugin, so it reaches the error handler below as-is
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: "RATE_LIMITED",
      message: `Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.`,
    }),
  });

  if (redisClient) {
    const redis = redisClient;
    fastify.addHook("onClose", async () => {
      await redis.quit();
    });
  }

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: { title: "StudyForge API", description: "Local-LLM study material generator", version: "1.0.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes, { services });
  await fastify.register(statusRoutes, { services });
  await fastify.register(generateRoutes, { services });
  await fastify.register(notesRoutes, { services });

  // ─── Error handlers ──────────────────────────────────────────────────────────

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    void reply.code(statusCode).send({
      data: null,
      requestId: request.id,
      errors: [{
        code: error.code ?? "INTERNAL_ERROR",
        message: statusCode >= 500 ? "An internal server error occurred." : error.message,
      }],
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({
      data: null,
      requestId: request.id,
      errors: [{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }],
    });
  });

  return fastify;
}
