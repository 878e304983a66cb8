/**
 * JSON Schema for a front-matter mapping, checked before a ContentItem is built.
 * `date` arrives here as a string: TOML date-times are normalized beforehand.
 */
export const FrontMatterSchema = {
  type: 'object',
  properties: {
    // at least one visible character
    title: { type: 'string', pattern: '\\S' },
    date: {
      type: 'string',
      format: 'date-time',
      // explicit offset, e.g. Z or +01:00
      pattern: '(?:[Zz]|[+-]\\d{2}:\\d{2})$',
    },
    draft: { type: 'boolean' },
    summary: { type: 'string' },
  },
  required: ['title', 'date'],
  additionalProperties: true,
};

/**
 * Expected type per known field, as named in InvalidFieldType errors
 */
export const FIELD_TYPES: Readonly<Record<string, string>> = {
  title: 'non-empty string',
  date: 'timestamp',
  draft: 'boolean',
  summary: 'string',
};
