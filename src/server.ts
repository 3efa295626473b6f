import Fastify, { type FastifyInstance } from "fastify";
import { RiskScorer } from "./application/risk-scorer.js";
import { AppError, InvalidInputError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { RiskMetricsRegistry } from "./infra/metrics.js";
import type { RiskEnginePort } from "./ports/risk-engine.js";

export function buildApp(config: RuntimeConfig = loadRuntimeConfig()): FastifyInstance {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
  });
  const metrics = new RiskMetricsRegistry();
  const requestStarts = new WeakMap<object, bigint>();

  const riskEngine: RiskEnginePort = new RiskScorer(config.scoring, {
    onEvaluated: (evaluation, signals) => {
      if (config.metricsEnabled) {
        metrics.recordEvaluation(evaluation, signals);
      }
    },
  });

  app.addHook("onRequest", async (request) => {
    requestStarts.set(request, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/health", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/config", async (_, reply) => {
    return reply.status(200).send(riskEngine.describeConfig());
  });

  app.post("/transaction", async (request, reply) => {
    const evaluation = riskEngine.evaluate(request.body);
    request.log.info(
      {
        transaction_id: evaluation.transaction_id,
        decision: evaluation.decision,
        risk_score: evaluation.risk_score,
        reasons: evaluation.reasons,
      },
      "transaction scored",
    );
    return reply.status(200).send(evaluation);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error instanceof InvalidInputError) {
        request.log.warn({ code: error.code }, error.message);
        if (config.metricsEnabled) {
          metrics.recordInvalidInput(error.code);
        }
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}
