/**
 * Document sources feeding the index build with (text, sourceFile) pairs
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger.js";
import type { ChunkInput } from "../types/rag.js";

export interface DocumentSource {
  readonly description: string;
  load(): Promise<ChunkInput[]>;
}

export interface DirectoryDocumentSourceOptions {
  readonly rootDir: string;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
}

const ALLOWED_EXTENSIONS = new Set([".md", ".txt"]);

export class DirectoryDocumentSource implements DocumentSource {
  readonly description: string;

  constructor(private readonly options: DirectoryDocumentSourceOptions) {
    this.description = `directory:${options.rootDir}`;
  }

  async load(): Promise<ChunkInput[]> {
    const files = (await this.findEligibleFiles(this.options.rootDir)).sort();
    const inputs: ChunkInput[] = [];

    for (const filePath of files) {
      try {
        const text = await fs.readFile(filePath, "utf8");
        const sourceFile = path.basename(filePath, path.extname(filePath));

        for (const chunk of chunkText(
          text,
          this.options.chunkSize,
          this.options.chunkOverlap
        )) {
          inputs.push({ text: chunk, sourceFile });
        }
      } catch (error) {
        logger.warn("Failed to read document", {
          filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info("Documents loaded", {
      source: this.description,
      files: files.length,
      chunks: inputs.length,
    });

    return inputs;
  }

  private async findEligibleFiles(dir: string): Promise<string[]> {
    const results: string[] = [];
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }

      const resolved = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        results.push(...(await this.findEligibleFiles(resolved)));
      } else if (
        entry.isFile() &&
        ALLOWED_EXTENSIONS.has(path.extname(entry.name).toLowerCase())
      ) {
        results.push(resolved);
      }
    }

    return results;
  }
}

/**
 * Split text into overlapping windows after collapsing whitespace
 */
export function chunkText(raw: string, chunkSize: number, overlap: number): string[] {
  const cleaned = raw.replace(/\r\n/g, "\n").replace(/\s+/g, " ").trim();

  if (!cleaned) {
    return [];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < cleaned.length) {
    const end = Math.min(cleaned.length, start + chunkSize);
    chunks.push(cleaned.slice(start, end).trim());

    if (end === cleaned.length) {
      break;
    }

    start = Math.max(start + 1, end - overlap);
  }

  return chunks.filter(Boolean);
}
