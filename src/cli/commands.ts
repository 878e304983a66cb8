import { ContentGateConfig, ContentItem, ErrorPolicy } from '../types';
import {
  describeContentError,
  loadContentDir,
  loadContentFile,
  Logger,
  publishable,
  SilentLogger,
} from '../core';

export interface ListOptions {
  drafts?: boolean;
  future?: boolean;
}

/**
 * Load every file and report each failure. Returns the process exit code.
 */
export async function checkCommand(
  dir: string,
  config: ContentGateConfig,
  out: Logger
): Promise<number> {
  const { items, failures } = await loadContentDir(dir, {
    extensions: config.extensions,
    onError: ErrorPolicy.Skip,
    logger: new SilentLogger(),
  });

  failures.forEach(({ error }) => out.error(`✗ ${describeContentError(error)}`));

  const drafts = items.filter((item) => item.draft).length;
  out.log(
    `${items.length} item(s) valid (${drafts} draft), ${failures.length} failed in ${dir}`
  );

  return failures.length > 0 ? 1 : 0;
}

/**
 * Print the publishable items, newest first
 */
export async function listCommand(
  dir: string,
  config: ContentGateConfig,
  options: ListOptions,
  out: Logger,
  now: Date = new Date()
): Promise<number> {
  const { items } = await loadContentDir(dir, {
    extensions: config.extensions,
    onError: config.onError,
    logger: out,
  });

  const includeDrafts = options.drafts ?? config.includeDrafts;
  const buildFuture = options.future ?? config.buildFuture;
  const listing = Array.from(
    publishable(items, { includeDrafts, now: buildFuture ? undefined : now })
  );

  if (listing.length === 0) {
    out.log('No publishable content.');
    return 0;
  }

  listing.forEach((item) => out.log(formatListEntry(item)));
  return 0;
}

/**
 * Print the metadata of a single file
 */
export async function showCommand(file: string, out: Logger): Promise<number> {
  const item = await loadContentFile(file);

  out.log(`Title:   ${item.title}`);
  out.log(`Date:    ${item.date.toISOString()}`);
  out.log(`Draft:   ${item.draft ? 'yes' : 'no'}`);
  if (item.summary !== undefined) {
    out.log(`Summary: ${item.summary}`);
  }
  const params = Object.keys(item.params);
  if (params.length > 0) {
    out.log(`Params:  ${params.join(', ')}`);
  }
  out.log(`Body:    ${item.body.length} character(s)`);

  return 0;
}

export function formatListEntry(item: ContentItem): string {
  const day = item.date.toISOString().slice(0, 10);
  const marker = item.draft ? ' [draft]' : '';
  const origin = item.source ? `  (${item.source})` : '';
  return `${day}  ${item.title}${marker}${origin}`;
}
