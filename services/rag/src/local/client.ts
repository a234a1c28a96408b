import { readdir, stat } from "node:fs/promises";
import { extname, join, relative, sep } from "node:path";
import { errorMessage, silentLogger, type Logger } from "@docent/common";
import { ConfigurationError, IngestionError } from "../errors.js";
import type { Document } from "../indexing/types.js";
import { extractText } from "./extract.js";
import type { LoadResult, LocalFile } from "./types.js";

export interface LocalFileClientConfig {
  directory: string;
  extensions: string[];
  logger?: Logger;
}

export class LocalFileClient {
  readonly directory: string;
  private readonly extensions: Set<string>;
  private readonly logger: Logger;

  constructor(config: LocalFileClientConfig) {
    this.directory = config.directory;
    this.extensions = new Set(config.extensions.map((e) => e.toLowerCase()));
    this.logger = (config.logger ?? silentLogger).child({ component: "local-files" });
  }

  /**
   * Recursively scan the directory and yield matching files in name order.
   * Subdirectories that cannot be listed are reported through `errors`.
   */
  async *getAllFiles(errors: IngestionError[] = []): AsyncGenerator<LocalFile> {
    yield* this.scanDirectory(this.directory, errors);
  }

  /** Read every matching file into a Document. */
  async loadDocuments(): Promise<LoadResult> {
    await this.assertDirectory();

    const result: LoadResult = { documents: [], errors: [] };
    for await (const file of this.getAllFiles(result.errors)) {
      try {
        const content = (await extractText(file.filePath, file.extension)).trim();
        result.documents.push(this.toDocument(file, content));
      } catch (error) {
        const failure = new IngestionError(file.relativePath, errorMessage(error), error);
        this.logger.warn("Could not read file", { file: file.relativePath, error: failure.message });
        result.errors.push(failure);
      }
    }

    this.logger.info("Loaded documents", {
      directory: this.directory,
      documents: result.documents.length,
      errors: result.errors.length,
    });
    return result;
  }

  private toDocument(file: LocalFile, content: string): Document {
    return {
      content,
      metadata: {
        filename: file.relativePath,
        type: file.extension.slice(1),
        lastModified: file.modifiedAt.toISOString(),
      },
    };
  }

  private async assertDirectory(): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await stat(this.directory)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(`Document directory ${this.directory} is not readable`, error);
    }
    if (!isDirectory) {
      throw new ConfigurationError(`Document directory ${this.directory} is not a directory`);
    }
  }

  private async *scanDirectory(dir: string, errors: IngestionError[]): AsyncGenerator<LocalFile> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      errors.push(new IngestionError(this.relativePath(dir) || ".", errorMessage(error), error));
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        yield* this.scanDirectory(fullPath, errors);
      } else if (entry.isFile()) {
        const extension = extname(entry.name).toLowerCase();
        if (!this.extensions.has(extension)) continue;

        try {
          const fileStat = await stat(fullPath);
          yield {
            filePath: fullPath,
            relativePath: this.relativePath(fullPath),
            extension,
            modifiedAt: fileStat.mtime,
          };
        } catch (error) {
          errors.push(new IngestionError(this.relativePath(fullPath), errorMessage(error), error));
        }
      }
    }
  }

  private relativePath(fullPath: string): string {
    return relative(this.directory, fullPath).split(sep).join("/");
  }
}
