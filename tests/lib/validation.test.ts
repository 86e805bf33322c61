import { describe, it, expect } from 'vitest';
import {
  prepareAlbumIds,
  prepareChoices,
  prepareNumericIds,
  validateAlbumId,
  validateChoice,
  validateInteger,
  validateNonEmpty,
  validateNumericId,
  ValidationError,
} from '../../src/lib/validation.js';

describe('validateNumericId', () => {
  it('should accept integers and digit strings', () => {
    expect(validateNumericId('trackId', 344521217)).toBe(344521217);
    expect(validateNumericId('trackId', ' 23929516 ')).toBe(23929516);
  });

  it('should reject negative, fractional and non-numeric values', () => {
    expect(() => validateNumericId('trackId', -1)).toThrow('Invalid trackId -1.');
    expect(() => validateNumericId('trackId', 1.5)).toThrow('Invalid trackId 1.5.');
    expect(() => validateNumericId('trackId', 'abc')).toThrow("Invalid trackId 'abc'.");
  });

  it('should name the parameter on the error', () => {
    try {
      validateNumericId('artistId', 'x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ parameter: 'artistId', code: 'INVALID_ARGUMENT' });
    }
  });
});

describe('prepareNumericIds', () => {
  it('should normalize single values, lists and comma-separated strings', () => {
    expect(prepareNumericIds('trackIds', 1)).toEqual([1]);
    expect(prepareNumericIds('trackIds', ['1', 2])).toEqual([1, 2]);
    expect(prepareNumericIds('trackIds', '1, 2,,3')).toEqual([1, 2, 3]);
  });

  it('should require at least one ID', () => {
    expect(() => prepareNumericIds('trackIds', ' , ')).toThrow(
      'At least one ID must be specified for trackIds.'
    );
  });
});

describe('album IDs', () => {
  it('should accept alphanumeric IDs', () => {
    expect(validateAlbumId('ho1xc2bmmn5ra')).toBe('ho1xc2bmmn5ra');
    expect(prepareAlbumIds('abc, 0060253780968')).toBe('abc,0060253780968');
  });

  it('should reject other characters', () => {
    expect(() => validateAlbumId('abc-123')).toThrow("Album ID 'abc-123' is not alphanumeric.");
    expect(() => prepareAlbumIds([])).toThrow('At least one album ID must be specified.');
  });
});

describe('validateInteger', () => {
  it('should accept values inside the bounds', () => {
    expect(validateInteger('limit', 1, 1, 500)).toBe(1);
    expect(validateInteger('limit', 500, 1, 500)).toBe(500);
  });

  it('should describe the accepted range', () => {
    expect(() => validateInteger('limit', 0, 1, 500)).toThrow(
      'limit must be an integer between 1 and 500, inclusive.'
    );
    expect(() => validateInteger('offset', -1, 0)).toThrow(
      'offset must be an integer greater than or equal to 0.'
    );
    expect(() => validateInteger('count', 11, undefined, 10)).toThrow(
      'count must be an integer less than or equal to 10.'
    );
    expect(() => validateInteger('limit', 2.5)).toThrow('limit must be an integer.');
  });
});

describe('choices', () => {
  const RELEASE_TYPES = ['album', 'live', 'epSingle'] as const;

  it('should match case-insensitively and return the canonical spelling', () => {
    expect(validateChoice('release type', ' EPSINGLE ', RELEASE_TYPES)).toBe('epSingle');
  });

  it('should list the valid values', () => {
    expect(() => validateChoice('release type', 'single', RELEASE_TYPES)).toThrow(
      "Invalid release type 'single'. Valid values: 'album', 'live', 'epSingle'."
    );
  });

  it('should join several choices', () => {
    expect(prepareChoices('release type', 'album, Live', RELEASE_TYPES)).toBe('album,live');
    expect(prepareChoices('release type', ['live'], RELEASE_TYPES)).toBe('live');
  });
});

describe('validateNonEmpty', () => {
  it('should trim and reject blank strings', () => {
    expect(validateNonEmpty('query', '  kind of blue ')).toBe('kind of blue');
    expect(() => validateNonEmpty('query', '   ')).toThrow('query must not be empty.');
  });
});
