import * as fs from 'fs/promises';
import * as path from 'path';
import { ContentItem, ErrorPolicy } from '../types';
import { parseContentItem } from './content-item';
import { ContentError, describeContentError } from './errors';
import { defaultLogger, Logger } from './logger';

export interface LoadOptions {
  /** File extensions treated as content, with the leading dot */
  extensions?: string[];
  onError?: ErrorPolicy;
  logger?: Logger;
  /** Files read at the same time; keeps large trees under the descriptor limit */
  concurrency?: number;
}

export interface LoadFailure {
  path: string;
  error: ContentError;
}

export interface LoadResult {
  items: ContentItem[];
  failures: LoadFailure[];
}

const DEFAULT_EXTENSIONS = ['.md'];
const DEFAULT_CONCURRENCY = 32;

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Read and parse a single content file.
 * I/O errors propagate as they are; content errors carry the file path.
 */
export async function loadContentFile(filePath: string): Promise<ContentItem> {
  const bytes = await fs.readFile(filePath);
  return parseContentItem(bytes, { source: filePath });
}

/**
 * Recursively list content files under a directory, sorted by path
 */
export async function findContentFiles(
  dir: string,
  extensions: string[] = DEFAULT_EXTENSIONS
): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  // one directory open at a time
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findContentFiles(entryPath, extensions)));
    } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
      files.push(entryPath);
    }
  }
  return files.sort();
}

/**
 * Load every content file under a directory.
 *
 * Files are read and parsed independently, at most `concurrency` at a
 * time. Under `halt` the first failing file (in path order) is thrown;
 * under `skip` each failure is logged and collected while the rest load.
 */
export async function loadContentDir(dir: string, options: LoadOptions = {}): Promise<LoadResult> {
  const policy = options.onError ?? ErrorPolicy.Skip;
  const logger = options.logger ?? defaultLogger;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);

  const files = await findContentFiles(dir, options.extensions);
  const outcomes: PromiseSettledResult<ContentItem>[] = [];
  for (const batch of chunk(files, concurrency)) {
    outcomes.push(...(await Promise.allSettled(batch.map((file) => loadContentFile(file)))));
  }

  const result: LoadResult = { items: [], failures: [] };
  outcomes.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      result.items.push(outcome.value);
      return;
    }

    const reason: unknown = outcome.reason;
    if (!(reason instanceof ContentError) || policy === ErrorPolicy.Halt) {
      throw reason;
    }

    logger.warn(describeContentError(reason));
    result.failures.push({ path: files[index], error: reason });
  });

  return result;
}
