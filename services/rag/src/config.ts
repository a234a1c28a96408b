import { z } from "zod";
import { ConfigurationError } from "./errors.js";

type Env = Record<string, string | undefined>;

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true"));

const ConfigSchema = z
  .object({
    // Embedding settings
    embedding: z.object({
      provider: z.enum(["openai", "voyage", "cohere"]),
      apiKey: z.string().min(1),
      // Unset means the provider's own default
      model: z.string().min(1).optional(),
      dimensions: z.coerce.number().int().positive().optional(),
    }),

    // Vector index settings
    index: z.object({
      backend: z.enum(["memory", "qdrant"]),
      collectionName: z.string().min(1),
      persistDirectory: z.string().min(1).optional(),
      pruneStale: booleanFlag(true),
    }),

    qdrant: z.object({
      url: z.string().url(),
      apiKey: z.string().optional(),
    }),

    // Chunking settings
    chunking: z.object({
      chunkSize: z.coerce.number().int().positive(),
      chunkOverlap: z.coerce.number().int().nonnegative(),
      lengthUnit: z.enum(["characters", "tokens"]),
    }),

    // Source document settings
    documents: z.object({
      directory: z.string().min(1),
      extensions: z.array(z.string().regex(/^\.[\w]+$/, "must look like .ext")).min(1),
      pruneMissing: booleanFlag(false),
    }),

    sync: z.object({
      cronSchedule: z.string().min(1),
      onStart: booleanFlag(false),
    }),

    snapshotFile: z.string().min(1),

    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .refine((config) => config.chunking.chunkOverlap < config.chunking.chunkSize, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["chunking", "chunkOverlap"],
  });

export type Config = z.infer<typeof ConfigSchema>;

function list(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse({
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      apiKey: env.EMBEDDING_API_KEY,
      model: env.EMBEDDING_MODEL || undefined,
      dimensions: env.EMBEDDING_DIMENSIONS || undefined,
    },
    index: {
      backend: env.INDEX_BACKEND ?? "memory",
      collectionName: env.INDEX_COLLECTION ?? "rag_collection",
      persistDirectory: env.INDEX_PERSIST_DIRECTORY || undefined,
      pruneStale: env.INDEX_PRUNE_STALE,
    },
    qdrant: {
      url: env.QDRANT_URL ?? "http://localhost:6333",
      apiKey: env.QDRANT_API_KEY || undefined,
    },
    chunking: {
      chunkSize: env.CHUNK_SIZE ?? "500",
      chunkOverlap: env.CHUNK_OVERLAP ?? "50",
      lengthUnit: env.CHUNK_LENGTH_UNIT ?? "characters",
    },
    documents: {
      directory: env.DOCUMENTS_DIRECTORY ?? "data",
      extensions: list(env.DOCUMENTS_EXTENSIONS) ?? [".txt", ".md", ".html", ".pdf"],
      pruneMissing: env.DOCUMENTS_PRUNE_MISSING,
    },
    sync: {
      cronSchedule: env.SYNC_CRON ?? "0 */6 * * *",
      onStart: env.SYNC_ON_START,
    },
    snapshotFile: env.SNAPSHOT_FILE ?? "knowledge_base.json",
    logLevel: env.LOG_LEVEL ?? "info",
  });

  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`, result.error);
  }
  return result.data;
}
