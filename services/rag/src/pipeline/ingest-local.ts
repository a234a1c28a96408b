import { silentLogger, type Logger } from "@docent/common";
import type { IngestionError } from "../errors.js";
import type { VectorIndex } from "../indexing/index.js";
import type { LocalFileClient } from "../local/index.js";

export interface IngestLocalOptions {
  /** Remove indexed sources whose file is gone from the directory. */
  pruneMissing?: boolean;
  logger?: Logger;
}

export interface IngestLocalResult {
  filesLoaded: number;
  filesFailed: number;
  chunksUpserted: number;
  staleChunksRemoved: number;
  sourcesRemoved: number;
  errors: IngestionError[];
}

export async function ingestLocalFiles(
  localFiles: LocalFileClient,
  index: VectorIndex,
  options: IngestLocalOptions = {},
): Promise<IngestLocalResult> {
  const { pruneMissing = false } = options;
  const logger = (options.logger ?? silentLogger).child({ component: "ingest-local" });

  logger.info("Processing local files", { directory: localFiles.directory });

  const loaded = await localFiles.loadDocuments();
  const report = await index.ingest(loaded.documents);

  const result: IngestLocalResult = {
    filesLoaded: loaded.documents.length,
    filesFailed: loaded.errors.length + report.documentsSkipped,
    chunksUpserted: report.chunksUpserted,
    staleChunksRemoved: report.staleChunksRemoved,
    sourcesRemoved: 0,
    errors: [...loaded.errors, ...report.errors],
  };

  if (pruneMissing) {
    // Files that exist but failed to load keep their previous chunks
    const present = new Set<string>([
      ...loaded.documents.map((document) => document.metadata.filename),
      ...loaded.errors.map((error) => error.source),
    ]);
    for (const filename of await index.listSources()) {
      if (present.has(filename)) continue;
      result.staleChunksRemoved += await index.removeSource(filename);
      result.sourcesRemoved++;
      logger.info("Removed missing source", { filename });
    }
  }

  for (const error of result.errors) {
    logger.error("File ingestion error", { source: error.source, error: error.message });
  }
  logger.info("Local file ingestion complete", {
    filesLoaded: result.filesLoaded,
    filesFailed: result.filesFailed,
    chunksUpserted: result.chunksUpserted,
    staleChunksRemoved: result.staleChunksRemoved,
    sourcesRemoved: result.sourcesRemoved,
  });

  return result;
}
