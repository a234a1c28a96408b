import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { errorMessage } from "@docent/common";
import { IngestionError } from "../errors.js";
import { DocumentSchema, ExportedRecordSchema, type VectorIndex } from "../indexing/index.js";
import type { Document } from "../indexing/types.js";
import type { LocalFileClient } from "../local/client.js";

const SnapshotSchema = z.object({
  version: z.literal(1),
  exportedAt: z.string(),
  collectionName: z.string(),
  recordCount: z.number().int().nonnegative(),
  records: z.array(ExportedRecordSchema),
  documents: z.array(DocumentSchema).default([]),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

export interface WriteSnapshotOptions {
  outputFile: string;
  /** Raw source documents to store next to the chunk records. */
  documents?: Document[];
  now?: () => Date;
}

export interface WriteSnapshotResult {
  filePath: string;
  recordCount: number;
}

/** Dump every stored record (and optionally the source documents) to a JSON file. */
export async function writeSnapshot(
  index: VectorIndex,
  options: WriteSnapshotOptions,
): Promise<WriteSnapshotResult> {
  const records = await index.exportAll();
  const snapshot: Snapshot = {
    version: 1,
    exportedAt: (options.now ?? (() => new Date()))().toISOString(),
    collectionName: index.collectionName,
    recordCount: records.length,
    records,
    documents: options.documents ?? [],
  };

  const filePath = resolve(options.outputFile);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(snapshot, null, 2), "utf-8");
  return { filePath, recordCount: records.length };
}

export interface ExportKnowledgeOptions {
  outputFile: string;
  now?: () => Date;
}

export interface ExportKnowledgeResult extends WriteSnapshotResult {
  documentCount: number;
}

/** Snapshot the index together with the source documents currently on disk. */
export async function exportKnowledge(
  index: VectorIndex,
  source: LocalFileClient,
  options: ExportKnowledgeOptions,
): Promise<ExportKnowledgeResult> {
  const { documents } = await source.loadDocuments();
  const written = await writeSnapshot(index, { ...options, documents });
  return { ...written, documentCount: documents.length };
}

export async function readSnapshot(file: string): Promise<Snapshot> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    throw new IngestionError(file, `cannot read snapshot: ${errorMessage(error)}`, error);
  }

  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new IngestionError(file, `invalid snapshot: ${problems.join("; ")}`, parsed.error);
  }
  if (parsed.data.recordCount !== parsed.data.records.length) {
    throw new IngestionError(
      file,
      `invalid snapshot: recordCount is ${parsed.data.recordCount} but ${parsed.data.records.length} records are present`,
    );
  }
  return parsed.data;
}

/** Re-embed a snapshot's records into the index under their saved ids. */
export async function restoreSnapshot(index: VectorIndex, file: string): Promise<number> {
  const snapshot = await readSnapshot(file);
  return index.restore(snapshot.records);
}
