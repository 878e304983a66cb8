export { splitFrontMatter, parseFrontMatter, decodeSource } from './front-matter-parser';
export { validateMetadata } from './metadata-validator';
export { parseContentItem, bodyLines, ParseOptions } from './content-item';
export { publishable, isPublishable } from './draft-filter';
export {
  loadContentFile,
  loadContentDir,
  findContentFiles,
  LoadOptions,
  LoadFailure,
  LoadResult,
} from './content-loader';
export {
  ContentError,
  MissingFrontMatterError,
  MalformedFrontMatterError,
  MissingRequiredFieldError,
  InvalidFieldTypeError,
  describeContentError,
} from './errors';
export { Logger, ConsoleLogger, SilentLogger, defaultLogger } from './logger';
