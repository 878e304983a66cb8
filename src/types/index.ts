/**
 * Front-matter syntaxes, keyed by the fence that opens the block.
 *
 * `+++` - TOML
 * `---` - YAML
 */
export type FrontMatterFormat = 'toml' | 'yaml';

/**
 * A decoded front-matter block, before validation
 */
export type FrontMatterData = Record<string, unknown>;

/**
 * Result of splitting a source file at its front-matter fences
 */
export interface FrontMatterSplit {
  format: FrontMatterFormat;
  /** Raw text between the fences */
  block: string;
  /** Everything after the closing fence line, verbatim */
  body: string;
}

export interface ParsedFrontMatter {
  format: FrontMatterFormat;
  data: FrontMatterData;
  body: string;
}

/**
 * Front-matter metadata that passed validation
 */
export interface ContentMetadata {
  readonly title: string;
  readonly date: Date;
  readonly draft: boolean;
  readonly summary?: string;
  /** Every front-matter key that is not one of the fields above */
  readonly params: Readonly<Record<string, unknown>>;
}

/**
 * One publishable unit of content: validated metadata plus its markdown body.
 * Frozen once built.
 */
export interface ContentItem extends ContentMetadata {
  readonly body: string;
  /** Path the item was read from, when it came from disk */
  readonly source?: string;
}

/**
 * Kinds of content failures, as reported to the build
 */
export enum ContentErrorKind {
  MissingFrontMatter = 'MissingFrontMatter',
  MalformedFrontMatter = 'MalformedFrontMatter',
  MissingRequiredField = 'MissingRequiredField',
  InvalidFieldType = 'InvalidFieldType',
}

/**
 * What a batch load does when one file fails
 */
export enum ErrorPolicy {
  Halt = 'halt', // Throw the first failure
  Skip = 'skip', // Log it, record it, continue with the rest
}

export interface PublishOptions {
  /** Keep draft items (preview builds) */
  includeDrafts?: boolean;
  /** Drop items dated after this instant */
  now?: Date;
}

export interface ContentGateConfig {
  contentDir: string;
  extensions: string[];
  onError: ErrorPolicy;
  includeDrafts: boolean;
  buildFuture: boolean;
}
