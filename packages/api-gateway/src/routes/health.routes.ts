import type { FastifyInstance } from "fastify";
import { summarizeReadiness } from "@studyforge/llm-orchestrator";
import type { RouteOptions } from "./envelope.js";

export async function healthRoutes(fastify: FastifyInstance, { services }: RouteOptions): Promise<void> {

  /** GET /health — liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready — readiness from the last published status snapshot */
  fastify.get("/health/ready", async (_request, reply) => {
    const snapshot = services.aggregator.getStatus();
    const readiness = summarizeReadiness(snapshot);
    return reply.code(readiness === "unavailable" ? 503 : 200).send({
      status: readiness,
      issues: snapshot.issues,
      checkedAt: snapshot.checkedAt,
    });
  });
}
