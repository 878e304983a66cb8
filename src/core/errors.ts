import { ContentErrorKind } from '../types';

/**
 * Base class for every failure to turn a source file into a ContentItem.
 * Content parsing is deterministic, so none of these are retryable.
 */
export abstract class ContentError extends Error {
  abstract readonly kind: ContentErrorKind;

  /** File the error came from, when known */
  path?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Attach the offending file path
   */
  atPath(path: string): this {
    this.path = path;
    return this;
  }
}

export class MissingFrontMatterError extends ContentError {
  readonly kind = ContentErrorKind.MissingFrontMatter;

  constructor() {
    super('No front matter fence (+++ or ---) at the start of the file');
  }
}

export class MalformedFrontMatterError extends ContentError {
  readonly kind = ContentErrorKind.MalformedFrontMatter;
}

export class MissingRequiredFieldError extends ContentError {
  readonly kind = ContentErrorKind.MissingRequiredField;

  constructor(readonly key: string) {
    super(`Missing required field "${key}"`);
  }
}

export class InvalidFieldTypeError extends ContentError {
  readonly kind = ContentErrorKind.InvalidFieldType;

  constructor(
    readonly key: string,
    readonly expectedType: string
  ) {
    super(`Field "${key}" must be a ${expectedType}`);
  }
}

/**
 * One-line report of a content error: `path: Kind: message`
 */
export function describeContentError(error: ContentError): string {
  const location = error.path ? `${error.path}: ` : '';
  return `${location}${error.kind}: ${error.message}`;
}
