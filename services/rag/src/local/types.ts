import type { IngestionError } from "../errors.js";
import type { Document } from "../indexing/types.js";

export interface LocalFile {
  filePath: string;
  /** Path below the scanned directory, always with forward slashes. */
  relativePath: string;
  /** Lower-cased, with the leading dot. */
  extension: string;
  modifiedAt: Date;
}

export interface LoadResult {
  documents: Document[];
  errors: IngestionError[];
}
