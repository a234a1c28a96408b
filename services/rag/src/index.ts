#!/usr/bin/env node
import { createLogger, errorMessage, type Logger } from "@docent/common";
import { loadConfig, type Config } from "./config.js";
import { isRagError } from "./errors.js";
import type { VectorIndex } from "./indexing/index.js";
import { exportKnowledge, ingestLocalFiles, restoreSnapshot } from "./pipeline/index.js";
import { startSyncScheduler } from "./scheduler/cron.js";
import { createLocalFileClient, openIndex } from "./setup.js";
import { initTracing } from "./tracing.js";

interface CliArgs {
  command: string;
  positional: string[];
  flags: Map<string, string>;
}

const VALUE_FLAGS = new Set(["--dir", "--limit", "--out"]);

function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        console.error(`Missing value for ${arg}`);
        process.exit(1);
      }
      flags.set(arg, value);
      i += 2; // consume the flag and its value
    } else {
      positional.push(arg);
      i++;
    }
  }

  const [command = "", ...rest] = positional;
  return { command, positional: rest, flags };
}

function printHelp(): void {
  console.log(`
docent - document chunking, indexing and semantic search

Commands:
  ingest [--dir <path>]          Chunk, embed and index the document directory
  search <query> [--limit <n>]   Nearest chunks for a query (default limit 5)
  info                           Show collection info
  export [--out <file>]          Write every indexed chunk to a JSON snapshot
  restore <file>                 Re-index the chunks of a snapshot
  daemon                         Re-ingest the directory on a cron schedule
  help                           Show this message

Environment variables required:
  EMBEDDING_PROVIDER       openai, voyage, or cohere
  EMBEDDING_API_KEY        API key for embedding provider

Optional:
  EMBEDDING_MODEL          Model name (default: text-embedding-3-small)
  EMBEDDING_DIMENSIONS     Vector size (default: 1536)
  INDEX_BACKEND            memory or qdrant (default: memory)
  INDEX_COLLECTION         Collection name (default: rag_collection)
  INDEX_PERSIST_DIRECTORY  Directory for the memory backend's file
  INDEX_PRUNE_STALE        Delete chunks a re-ingested file no longer has (default: true)
  QDRANT_URL               Qdrant URL (default: http://localhost:6333)
  CHUNK_SIZE               Maximum chunk length (default: 500)
  CHUNK_OVERLAP            Overlap between chunks (default: 50)
  CHUNK_LENGTH_UNIT        characters or tokens (default: characters)
  DOCUMENTS_DIRECTORY      Directory to scan (default: data)
  DOCUMENTS_EXTENSIONS     Comma-separated extensions (default: .txt,.md,.html,.pdf)
  DOCUMENTS_PRUNE_MISSING  Remove sources whose file is gone (default: false)
  SYNC_CRON                Cron schedule for daemon mode (default: 0 */6 * * *)
  SNAPSHOT_FILE            Export target (default: knowledge_base.json)

Examples:
  node dist/index.js ingest --dir ./docs
  node dist/index.js search "how to deploy" --limit 3
  node dist/index.js export --out backup.json
`);
}

async function handleIngest(
  index: VectorIndex,
  config: Config,
  directory: string | undefined,
  logger: Logger,
): Promise<void> {
  const localFiles = createLocalFileClient(config, logger, directory);
  const result = await ingestLocalFiles(localFiles, index, {
    pruneMissing: config.documents.pruneMissing,
    logger,
  });

  console.log(`Files loaded:         ${result.filesLoaded}`);
  console.log(`Files failed:         ${result.filesFailed}`);
  console.log(`Chunks upserted:      ${result.chunksUpserted}`);
  console.log(`Stale chunks removed: ${result.staleChunksRemoved}`);
  console.log(`Sources removed:      ${result.sourcesRemoved}`);
}

async function handleSearch(
  index: VectorIndex,
  query: string | undefined,
  limitFlag: string | undefined,
): Promise<void> {
  if (!query) {
    console.error("Usage: search <query> [--limit <n>]");
    process.exit(1);
  }

  const limit = limitFlag === undefined ? undefined : Number(limitFlag);
  console.log(`Searching for: "${query}"\n`);
  const results = await index.search(query, limit);

  if (results.length === 0) {
    console.log("No results found.");
    return;
  }

  console.log(`Found ${results.length} results:\n`);
  for (const hit of results) {
    console.log(`--- Distance: ${hit.distance.toFixed(3)} ---`);
    console.log(`Source: ${String(hit.metadata.filename)}`);
    console.log(`Content preview: ${hit.content.slice(0, 200)}...`);
    console.log();
  }
}

async function handleInfo(index: VectorIndex): Promise<void> {
  const count = await index.count();
  const sources = await index.listSources();
  console.log("=== Collection Info ===");
  console.log(`Backend:    ${index.backend}`);
  console.log(`Collection: ${index.collectionName}`);
  console.log(`Chunks:     ${count}`);
  console.log(`Sources:    ${sources.length}`);
  for (const source of sources) {
    console.log(`  ${source}`);
  }
}

async function handleExport(
  index: VectorIndex,
  config: Config,
  outputFile: string,
  logger: Logger,
): Promise<void> {
  const localFiles = createLocalFileClient(config, logger);
  const { filePath, recordCount, documentCount } = await exportKnowledge(index, localFiles, { outputFile });
  console.log(`Exported ${recordCount} chunks and ${documentCount} documents to ${filePath}`);
}

async function handleRestore(index: VectorIndex, file: string | undefined): Promise<void> {
  if (!file) {
    console.error("Usage: restore <file>");
    process.exit(1);
  }
  const restored = await restoreSnapshot(index, file);
  console.log(`Restored ${restored} chunks from ${file}`);
}

async function handleDaemon(index: VectorIndex, config: Config, logger: Logger): Promise<void> {
  logger.info("Starting RAG daemon");

  const localFiles = createLocalFileClient(config, logger);

  if (config.sync.onStart) {
    logger.info("Running initial ingestion");
    await ingestLocalFiles(localFiles, index, {
      pruneMissing: config.documents.pruneMissing,
      logger,
    });
  }

  const task = startSyncScheduler(localFiles, index, {
    cronSchedule: config.sync.cronSchedule,
    pruneMissing: config.documents.pruneMissing,
    logger,
  });

  process.on("SIGINT", () => {
    logger.info("Stopping daemon");
    task.stop();
    index
      .close()
      .catch((error: unknown) => logger.error("Close failed", { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  });

  logger.info("Daemon running, press Ctrl+C to stop");
}

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv.slice(2));

  if (!command || command === "help") {
    printHelp();
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  await initTracing();

  const index = await openIndex(config, logger);
  let keepOpen = false;

  try {
    switch (command) {
      case "ingest":
        await handleIngest(index, config, flags.get("--dir"), logger);
        break;
      case "search":
        await handleSearch(index, positional.join(" ") || undefined, flags.get("--limit"));
        break;
      case "info":
        await handleInfo(index);
        break;
      case "export":
        await handleExport(index, config, flags.get("--out") ?? config.snapshotFile, logger);
        break;
      case "restore":
        await handleRestore(index, positional[0]);
        break;
      case "daemon":
        await handleDaemon(index, config, logger);
        keepOpen = true;
        break;
      default:
        console.error(`Unknown command: ${command}`);
        console.error('Run with "help" to see available commands.');
        process.exit(1);
    }
  } finally {
    if (!keepOpen) await index.close();
  }
}

try {
  await main();
} catch (error) {
  if (isRagError(error)) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
}
