import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import { errorMessage, type Logger } from "@docent/common";
import {
  exportKnowledge,
  isRagError,
  type LocalFileClient,
  type RagErrorCode,
  type VectorIndex,
} from "@docent/rag";
import type { RagAssistant } from "./assistant.js";
import { LlmError, type LlmErrorCode } from "./llm/index.js";
import { createChatServices } from "./setup.js";
import { initTracing } from "./tracing.js";

type ErrorStatus = 400 | 429 | 500 | 502 | 503;

const ragStatus: Record<RagErrorCode, ErrorStatus> = {
  QUERY: 400,
  CONFIGURATION: 400,
  INGESTION: 500,
  INDEX_UNAVAILABLE: 503,
  EMBEDDING: 502,
};

const llmStatus: Record<LlmErrorCode, ErrorStatus> = {
  RATE_LIMITED: 429,
  API_ERROR: 502,
};

const QueryRequestSchema = z.object({
  question: z.string().optional(),
  user_id: z.string().min(1).optional(),
  session_id: z.string().min(1).optional(),
  n_results: z.number().int().positive().optional(),
});

const HistoryRequestSchema = z.object({
  user_id: z.string().min(1).optional(),
  session_id: z.string().optional(),
});

const DEFAULT_USER = "default_user";

export interface AppOptions {
  assistant: RagAssistant;
  index: VectorIndex;
  logger: Logger;
  /** Source documents included in the exported snapshot. */
  localFiles: LocalFileClient;
  /** Where GET /api/export_knowledge writes the snapshot. */
  snapshotFile: string;
}

export function createApp(options: AppOptions): Hono {
  const { assistant, index, localFiles, logger, snapshotFile } = options;
  const app = new Hono();

  // Request timing
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("http request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - start,
    });
  });

  app.onError((error, c) => {
    if (isRagError(error)) {
      const status = ragStatus[error.code];
      logger.warn("request failed", { path: c.req.path, code: error.code, message: error.message });
      return c.json({ error: error.message, code: error.code }, status);
    }
    if (error instanceof LlmError) {
      logger.error("llm call failed", { path: c.req.path, code: error.code, message: error.message });
      return c.json({ error: error.message, code: error.code }, llmStatus[error.code]);
    }
    logger.error("unexpected error", { path: c.req.path, error: errorMessage(error) });
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/api/query", async (c) => {
    const parsed = QueryRequestSchema.safeParse(await readJson(c.req.raw));
    if (!parsed.success) {
      return c.json({ error: "Invalid request", details: parsed.error.issues }, 400);
    }

    const { question, user_id: userId = DEFAULT_USER, n_results: nResults } = parsed.data;
    if (!question) {
      return c.json({ error: "Question is required" }, 400);
    }
    const sessionId = parsed.data.session_id ?? randomUUID();

    const result = await assistant.query({ question, userId, sessionId, nResults });
    return c.json({
      answer: result.answer,
      context: result.context,
      metadata: result.metadata,
      session_id: sessionId,
    });
  });

  app.post("/api/history", async (c) => {
    const parsed = HistoryRequestSchema.safeParse(await readJson(c.req.raw));
    if (!parsed.success) {
      return c.json({ error: "Invalid request", details: parsed.error.issues }, 400);
    }

    const { user_id: userId = DEFAULT_USER, session_id: sessionId } = parsed.data;
    if (!sessionId) {
      return c.json({ error: "Session ID is required" }, 400);
    }
    return c.json({ history: await assistant.history(userId, sessionId) });
  });

  app.get("/api/export_knowledge", async (c) => {
    const { recordCount, documentCount } = await exportKnowledge(index, localFiles, {
      outputFile: snapshotFile,
    });
    return c.json({
      message: `Knowledge base exported to ${snapshotFile}`,
      file_path: snapshotFile,
      record_count: recordCount,
      document_count: documentCount,
    });
  });

  app.get("/api/stats", async (c) => {
    const count = await index.count();
    return c.json({ collection: index.collectionName, count, isEmpty: count === 0 });
  });

  return app;
}

async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return undefined;
  }
}

// Only start the HTTP server when not running under vitest
if (!process.env.VITEST) {
  await initTracing();
  const services = await createChatServices();
  const { logger, chat } = services;
  const app = createApp({
    assistant: services.assistant,
    index: services.index,
    localFiles: services.localFiles,
    logger,
    snapshotFile: services.rag.snapshotFile,
  });

  const server = serve({ fetch: app.fetch, port: chat.port }, () => {
    logger.info("chat api listening", { port: chat.port, llm: chat.llm.provider });
  });

  process.on("SIGINT", () => {
    server.close();
    void Promise.all([services.index.close(), services.conversations.close()])
      .catch((error: unknown) => logger.error("shutdown failed", { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  });
}
