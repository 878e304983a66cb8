import { ContentItem } from '../types';
import { ContentError } from './errors';
import { parseFrontMatter } from './front-matter-parser';
import { validateMetadata } from './metadata-validator';

export interface ParseOptions {
  /** Origin path, recorded on the item and on any error */
  source?: string;
}

/**
 * Parse one content file into a frozen ContentItem.
 * Same bytes in, deep-equal item out; errors are thrown, never a partial item.
 */
export function parseContentItem(source: string | Buffer, options: ParseOptions = {}): ContentItem {
  try {
    const { data, body } = parseFrontMatter(source);
    const metadata = validateMetadata(data);
    const time = metadata.date.getTime();
    return Object.freeze({
      ...metadata,
      // Date objects cannot be frozen; every read gets its own copy
      get date() {
        return new Date(time);
      },
      body,
      source: options.source,
    });
  } catch (error) {
    if (error instanceof ContentError && options.source) {
      throw error.atPath(options.source);
    }
    throw error;
  }
}

/**
 * The body as its ordered lines. An empty body has no lines.
 */
export function bodyLines(item: ContentItem): string[] {
  if (item.body === '') {
    return [];
  }
  const lines = item.body.split(/\r?\n/);
  // a trailing newline terminates the last line rather than starting a new one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
