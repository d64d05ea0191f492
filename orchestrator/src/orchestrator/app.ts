import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import closeWithGrace from "close-with-grace";
import { parseKeywords } from "@mention-pulse/ingestor";
import { z } from "zod";

import { config } from "./config.js";
import { AppError, NotFoundError, ValidationError } from "./errors.js";
import { logRecoverableError } from "./error_utils.js";
import { buildHealthPayload } from "./health.js";
import { logger } from "./logger.js";
import { registry } from "./metrics.js";
import { MonitorPipeline, assertSourcesConfigured } from "./pipeline.js";
import { loadRecommendationRules } from "./recommendations.js";
import { disconnectRedis, getRedisClient } from "./redis_client.js";
import { RunManager } from "./run_manager.js";
import { MemoryRunStore, RedisRunStore, type RunRecord, type RunStore } from "./run_store.js";
import { createSentimentModel } from "./sentiment_model.js";

const API_VERSION = "0.1.0";

const AnalyzeBodySchema = z.object({
  company: z.string().trim().min(1).max(100),
  keywords: z.string().trim().min(1).max(500),
  since: z.string().datetime({ offset: true }).optional(),
  clusteringMode: z.enum(["online", "batch"]).optional(),
  partialReport: z.boolean().optional(),
});

const RunParamsSchema = z.object({ runId: z.string().min(1) });

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".");
    throw new ValidationError(issue ? `${field ? `${field}: ` : ""}${issue.message}` : "Invalid request");
  }
  return parsed.data;
}

/** What `/status` exposes; the full report stays in the record. */
function toStatusPayload(record: RunRecord) {
  return {
    runId: record.runId,
    status: record.status,
    brand: record.brand,
    keywords: record.keywords,
    since: record.since,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    executionTimeSeconds: record.executionTimeSeconds ?? null,
    error: record.error ?? null,
    result: record.report
      ? {
          report: record.report,
          report_markdown: record.reportMarkdown ?? "",
          chart_data: record.chartData ?? null,
        }
      : null,
  };
}

export async function buildHttpServer(runs: RunManager, orchestratorId = config.ORCHESTRATOR_ID): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  await server.register(cors, { origin: true, credentials: true });
  await server.register(helmet, { global: true });

  server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({ status: "error", message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ status: "error", message: error.message });
    }
    logRecoverableError(logger, error, { location: `${request.method} ${request.url}` }, "Unhandled request error");
    return reply.status(500).send({ status: "error", message: "Internal server error" });
  });

  server.get("/", async () => ({ message: "Mention Pulse API", version: API_VERSION }));

  server.get("/health", async () => buildHealthPayload(runs.health, orchestratorId));

  server.post("/analyze", async (request, reply) => {
    const body = parseOrThrow(AnalyzeBodySchema, request.body);
    const keywords = parseKeywords(body.keywords);
    if (keywords.length === 0) {
      throw new ValidationError("keywords: at least one keyword is required");
    }

    const record = await runs.start({
      brand: body.company,
      keywords,
      since: body.since ? new Date(body.since) : undefined,
      clusteringMode: body.clusteringMode,
      partialReport: body.partialReport,
    });

    return reply.status(202).send({
      runId: record.runId,
      status: "started",
      message: `Analysis started for ${record.brand}`,
      timestamp: record.createdAt,
    });
  });

  server.get("/status/:runId", async (request) => {
    const { runId } = parseOrThrow(RunParamsSchema, request.params);
    const record = await runs.get(runId);
    if (!record) {
      throw new NotFoundError(`Run ${runId} not found`);
    }
    return toStatusPayload(record);
  });

  server.get("/tasks", async () => {
    const records = await runs.list();
    return {
      tasks: records.map((record) => ({
        runId: record.runId,
        status: record.status,
        brand: record.brand,
        createdAt: record.createdAt,
      })),
      count: records.length,
    };
  });

  server.delete("/tasks/:runId", async (request) => {
    const { runId } = parseOrThrow(RunParamsSchema, request.params);
    const record = await runs.cancel(runId);
    return record
      ? { runId, status: record.status, message: `Run ${runId} cancelled` }
      : { runId, status: "removed", message: `Run ${runId} removed` };
  });

  return server;
}

export async function buildMetricsServer(): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  server.get("/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
    const body = await registry.metrics();
    reply.header("Content-Type", registry.contentType);
    return reply.send(body);
  });
  return server;
}

function createRunStore(): RunStore {
  if (config.REDIS_URL) {
    return new RedisRunStore(getRedisClient(config.REDIS_URL), config.RUN_TTL_SECONDS);
  }
  logger.warn("REDIS_URL not set; run records are kept in memory");
  return new MemoryRunStore();
}

export class OrchestratorApp {
  private running = false;
  private httpServer: FastifyInstance | null = null;
  private metricsServer: FastifyInstance | null = null;
  private runs: RunManager | null = null;

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const sources = assertSourcesConfigured();
    this.running = true;

    config.warnings.forEach((warning) => {
      logger.warn({ warning }, "Configuration warning");
    });

    const model = createSentimentModel();
    const rules = loadRecommendationRules(config.RECOMMENDATION_RULES_PATH);
    logger.info(
      { sources, modelVersion: model.version, rulesVersion: rules.version, rules: rules.rules.length },
      "Pipeline ready",
    );

    this.runs = new RunManager(new MonitorPipeline({ model, rules }), createRunStore());
    this.httpServer = await buildHttpServer(this.runs);
    this.metricsServer = await buildMetricsServer();

    await this.httpServer.listen({ port: config.HTTP_PORT, host: "0.0.0.0" });
    logger.info({ port: config.HTTP_PORT }, "HTTP API listening");
    await this.metricsServer.listen({ port: config.PROMETHEUS_PORT, host: "0.0.0.0" });
    logger.info({ port: config.PROMETHEUS_PORT }, "Metrics server listening");

    closeWithGrace({ delay: 500 }, async ({ signal, err }) => {
      if (err) {
        logger.error({ err, signal }, "Graceful shutdown due to error");
      } else {
        logger.info({ signal }, "Graceful shutdown initiated");
      }
      await this.stop();
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await Promise.all([this.httpServer?.close(), this.metricsServer?.close()]);
    this.httpServer = null;
    this.metricsServer = null;

    await this.runs?.stop();
    this.runs = null;
    await disconnectRedis();
    logger.info("Orchestrator stopped");
  }
}
