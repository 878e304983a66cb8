import { validateMetadata } from './metadata-validator';
import {
  InvalidFieldTypeError,
  MissingRequiredFieldError,
} from './errors';
import { captureError } from '../../tests/helpers/capture';

describe('validateMetadata', () => {
  const valid = { title: 'T', date: '2024-01-01T00:00:00+00:00' };

  describe('accepted metadata', () => {
    it('should default draft to false and leave summary unset', () => {
      const metadata = validateMetadata(valid);

      expect(metadata.title).toBe('T');
      expect(metadata.date.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(metadata.draft).toBe(false);
      expect(metadata.summary).toBeUndefined();
      expect(metadata.params).toEqual({});
    });

    it('should resolve the date offset to the same instant', () => {
      const metadata = validateMetadata({ ...valid, date: '2024-03-22T10:10:47+01:00' });

      expect(metadata.date.toISOString()).toBe('2024-03-22T09:10:47.000Z');
    });

    it('should accept a Z offset', () => {
      const metadata = validateMetadata({ ...valid, date: '2024-03-22T09:10:47Z' });

      expect(metadata.date.getTime()).toBe(Date.UTC(2024, 2, 22, 9, 10, 47));
    });

    it('should accept a Date decoded from a TOML offset date-time', () => {
      const metadata = validateMetadata({ ...valid, date: new Date('2024-03-22T09:10:47Z') });

      expect(metadata.date.toISOString()).toBe('2024-03-22T09:10:47.000Z');
    });

    it('should pass summary through unchanged', () => {
      const summary = '  Spacing and *markdown* kept  ';

      expect(validateMetadata({ ...valid, summary }).summary).toBe(summary);
    });

    it('should keep the draft flag', () => {
      expect(validateMetadata({ ...valid, draft: true }).draft).toBe(true);
      expect(validateMetadata({ ...valid, draft: false }).draft).toBe(false);
    });

    it('should coerce "true" and "false" strings for draft', () => {
      expect(validateMetadata({ ...valid, draft: 'true' }).draft).toBe(true);
      expect(validateMetadata({ ...valid, draft: 'false' }).draft).toBe(false);
    });

    it('should collect unknown keys into frozen params', () => {
      const metadata = validateMetadata({ ...valid, tags: ['terraform'], weight: 3 });

      expect(metadata.params).toEqual({ tags: ['terraform'], weight: 3 });
      expect(Object.isFrozen(metadata.params)).toBe(true);
    });

    it('should freeze copies of nested params', () => {
      const tags = ['terraform'];
      const metadata = validateMetadata({ ...valid, tags, seo: { keywords: ['k'] } });

      expect(Object.isFrozen(metadata.params.tags)).toBe(true);
      expect(Object.isFrozen(metadata.params.seo)).toBe(true);
      expect(Object.isFrozen(tags)).toBe(false);
    });

    it('should keep surrounding spaces of a title with visible text', () => {
      expect(validateMetadata({ ...valid, title: ' T ' }).title).toBe(' T ');
    });

    it('should not modify the input mapping', () => {
      const data = { ...valid, draft: 'true', extra: null };

      validateMetadata(data);

      expect(data).toEqual({ ...valid, draft: 'true', extra: null });
    });
  });

  describe('MissingRequiredField', () => {
    it('should name an absent title', () => {
      const error = captureError(() => validateMetadata({ date: valid.date }));

      expect(error).toBeInstanceOf(MissingRequiredFieldError);
      expect(error).toMatchObject({
        kind: 'MissingRequiredField',
        key: 'title',
        message: 'Missing required field "title"',
      });
    });

    it('should name an absent date', () => {
      expect(captureError(() => validateMetadata({ title: 'T' }))).toMatchObject({
        kind: 'MissingRequiredField',
        key: 'date',
      });
    });

    it('should report title first when both are absent', () => {
      expect(captureError(() => validateMetadata({}))).toMatchObject({ key: 'title' });
    });

    it('should treat a null value as absent', () => {
      expect(captureError(() => validateMetadata({ ...valid, title: null }))).toMatchObject({
        kind: 'MissingRequiredField',
        key: 'title',
      });
    });

    it('should report a missing field before a mistyped one', () => {
      expect(captureError(() => validateMetadata({ title: 42 }))).toMatchObject({
        kind: 'MissingRequiredField',
        key: 'date',
      });
    });
  });

  describe('InvalidFieldType', () => {
    it.each([
      ['an unparseable string', 'not-a-date'],
      ['a date without a time', '2024-01-01'],
      ['a date-time without an offset', '2024-01-01T00:00:00'],
      ['an impossible calendar date', '2024-02-30T00:00:00Z'],
      ['a number', 20240101],
    ])('should reject %s as a date', (_label, date) => {
      const error = captureError(() => validateMetadata({ ...valid, date }));

      expect(error).toBeInstanceOf(InvalidFieldTypeError);
      expect(error).toMatchObject({
        kind: 'InvalidFieldType',
        key: 'date',
        expectedType: 'timestamp',
        message: 'Field "date" must be a timestamp',
      });
    });

    it('should reject an invalid Date object', () => {
      expect(captureError(() => validateMetadata({ ...valid, date: new Date('nope') }))).toMatchObject({
        key: 'date',
        expectedType: 'timestamp',
      });
    });

    it('should reject an empty title', () => {
      expect(captureError(() => validateMetadata({ ...valid, title: '' }))).toMatchObject({
        kind: 'InvalidFieldType',
        key: 'title',
        expectedType: 'non-empty string',
      });
    });

    it('should reject a title of only whitespace', () => {
      expect(captureError(() => validateMetadata({ ...valid, title: ' \t ' }))).toMatchObject({
        kind: 'InvalidFieldType',
        key: 'title',
        expectedType: 'non-empty string',
      });
    });

    it('should reject a non-string title', () => {
      expect(captureError(() => validateMetadata({ ...valid, title: 42 }))).toMatchObject({
        key: 'title',
        expectedType: 'non-empty string',
      });
    });

    it('should reject a draft flag that is not a boolean', () => {
      expect(captureError(() => validateMetadata({ ...valid, draft: 'yes' }))).toMatchObject({
        key: 'draft',
        expectedType: 'boolean',
      });
    });

    it('should reject a non-string summary', () => {
      expect(captureError(() => validateMetadata({ ...valid, summary: 7 }))).toMatchObject({
        key: 'summary',
        expectedType: 'string',
      });
    });

    it('should report fields in order when several are wrong', () => {
      expect(
        captureError(() => validateMetadata({ title: '', date: 'soon', draft: 1 }))
      ).toMatchObject({ key: 'title' });
    });
  });
});
