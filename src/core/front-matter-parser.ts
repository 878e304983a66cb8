import * as Toml from '@iarna/toml';
import { parse as parseYaml } from 'yaml';
import { FrontMatterData, FrontMatterFormat, FrontMatterSplit, ParsedFrontMatter } from '../types';
import { MalformedFrontMatterError, MissingFrontMatterError } from './errors';

const TOML_FENCE = '+++';
const YAML_FENCE = '---';
const BYTE_ORDER_MARK = 0xfeff;

interface Line {
  text: string;
  /** Offset of the first character after the line break */
  next: number;
}

/**
 * Decode a source file to text, dropping a leading byte order mark
 */
export function decodeSource(source: string | Buffer): string {
  const text = typeof source === 'string' ? source : source.toString('utf-8');
  return text.charCodeAt(0) === BYTE_ORDER_MARK ? text.slice(1) : text;
}

/**
 * Split a source file into its front-matter block and body.
 *
 * The first line must be a fence; the block runs up to the next line
 * carrying the same fence. The body is everything after that line,
 * untouched.
 */
export function splitFrontMatter(source: string | Buffer): FrontMatterSplit {
  const text = decodeSource(source);
  const opening = readLine(text, 0);
  const fence = opening.text.trimEnd();
  const format = resolveFormat(fence);

  if (!format) {
    throw new MissingFrontMatterError();
  }

  let offset = opening.next;
  while (offset < text.length) {
    const line = readLine(text, offset);
    if (line.text.trimEnd() === fence) {
      return {
        format,
        block: text.slice(opening.next, offset),
        body: text.slice(line.next),
      };
    }
    offset = line.next;
  }

  throw new MalformedFrontMatterError(`Opening "${fence}" fence has no closing fence`);
}

/**
 * Split a source file and decode its front-matter block into a mapping
 */
export function parseFrontMatter(source: string | Buffer): ParsedFrontMatter {
  const { format, block, body } = splitFrontMatter(source);
  return { format, data: decodeBlock(block, format), body };
}

function decodeBlock(block: string, format: FrontMatterFormat): FrontMatterData {
  let data: unknown;
  try {
    data = format === 'toml' ? Toml.parse(block) : parseYaml(block);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedFrontMatterError(
      `Front matter is not valid ${format.toUpperCase()}: ${reason}`,
      { cause: error }
    );
  }

  // An empty YAML document decodes to null
  if (data === null || data === undefined) {
    return {};
  }
  if (!isMapping(data)) {
    throw new MalformedFrontMatterError('Front matter must be a key/value mapping');
  }
  return data;
}

function isMapping(value: unknown): value is FrontMatterData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function resolveFormat(fence: string): FrontMatterFormat | null {
  if (fence === TOML_FENCE) {
    return 'toml';
  }
  if (fence === YAML_FENCE) {
    return 'yaml';
  }
  return null;
}

function readLine(text: string, start: number): Line {
  const end = text.indexOf('\n', start);
  if (end === -1) {
    return { text: text.slice(start), next: text.length };
  }
  const line = text.slice(start, end);
  return {
    text: line.endsWith('\r') ? line.slice(0, -1) : line,
    next: end + 1,
  };
}
