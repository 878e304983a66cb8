import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { ContentMetadata, FrontMatterData } from '../types';
import {
  ContentError,
  InvalidFieldTypeError,
  MalformedFrontMatterError,
  MissingRequiredFieldError,
} from './errors';
import { FIELD_TYPES, FrontMatterSchema } from './schemas';

interface CheckedFrontMatter {
  title: string;
  date: string;
  draft?: boolean;
  summary?: string;
}

const REQUIRED_FIELDS = ['title', 'date'];
const KNOWN_FIELDS = ['title', 'date', 'draft', 'summary'];

// TOML local date/time values carry one of these flags; none is a point in time
const LOCAL_DATE_FLAGS = ['isFloating', 'isDate', 'isTime'];

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const checkFrontMatter = ajv.compile<CheckedFrontMatter>(FrontMatterSchema);

/**
 * Validate a decoded front-matter mapping.
 *
 * `title` and `date` are required, `draft` defaults to false and `summary`
 * passes through as is. Keys with a null value count as absent. Other keys
 * end up in `params`. The input mapping is left untouched.
 */
export function validateMetadata(data: FrontMatterData): ContentMetadata {
  const candidate: FrontMatterData = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== null) {
      candidate[key] = value;
    }
  }
  if ('date' in candidate) {
    candidate.date = normalizeDate(candidate.date);
  }
  if ('draft' in candidate) {
    candidate.draft = coerceBoolean(candidate.draft);
  }

  if (!checkFrontMatter(candidate)) {
    throw toContentError(checkFrontMatter.errors ?? []);
  }

  const date = new Date(candidate.date);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidFieldTypeError('date', FIELD_TYPES.date);
  }

  const params = Object.fromEntries(
    Object.entries(candidate)
      .filter(([key]) => !KNOWN_FIELDS.includes(key))
      .map(([key, value]) => [key, frozenCopy(value)])
  );

  return {
    title: candidate.title,
    date,
    draft: candidate.draft ?? false,
    summary: candidate.summary,
    params: Object.freeze(params),
  };
}

/**
 * TOML offset date-times decode to Date objects; turn those into RFC 3339
 * strings so one schema covers both syntaxes. Local dates stay Date
 * objects and fail the string check.
 */
function normalizeDate(value: unknown): unknown {
  if (!(value instanceof Date)) {
    return value;
  }
  const isLocal = LOCAL_DATE_FLAGS.some((flag) => Reflect.get(value, flag) === true);
  if (isLocal || Number.isNaN(value.getTime())) {
    return value;
  }
  return value.toISOString();
}

/**
 * Copy arrays and tables all the way down and freeze every level
 */
function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(frozenCopy));
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (typeof value === 'object' && value !== null) {
    return Object.freeze(
      Object.fromEntries(Object.entries(value).map(([key, nested]) => [key, frozenCopy(nested)]))
    );
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Pick the error to report: missing fields first, then type errors in
 * field order.
 */
function toContentError(errors: ErrorObject[]): ContentError {
  for (const key of REQUIRED_FIELDS) {
    const missing = errors.some(
      (error) => error.keyword === 'required' && error.params.missingProperty === key
    );
    if (missing) {
      return new MissingRequiredFieldError(key);
    }
  }

  for (const key of KNOWN_FIELDS) {
    if (errors.some((error) => error.instancePath === `/${key}`)) {
      return new InvalidFieldTypeError(key, FIELD_TYPES[key]);
    }
  }

  return new MalformedFrontMatterError(ajv.errorsText(errors));
}
