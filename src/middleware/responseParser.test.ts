import { describe, expect, it } from 'vitest';
import { MalformedDataError } from '../core/errors';
import { extractJsonPayload, parseResponseBody } from './responseParser';

describe('extractJsonPayload', () => {
  it('drops everything up to the first single quote', () => {
    expect(extractJsonPayload(")]}'\n[1,2]")).toBe('\n[1,2]');
  });

  it('keeps later quotes in the payload', () => {
    expect(extractJsonPayload(")]}'[\"it's\"]")).toBe('["it\'s"]');
  });

  it('uses the whole text when there is no quote', () => {
    expect(extractJsonPayload('[[],null]')).toBe('[[],null]');
  });
});

describe('parseResponseBody', () => {
  it('decodes a guarded array', () => {
    expect(parseResponseBody(")]}'\n[[],null,\"GgA=\"]")).toEqual([[], null, 'GgA=']);
  });

  it('decodes an unguarded array', () => {
    expect(parseResponseBody('[1]')).toEqual([1]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseResponseBody(")]}'\n<html>")).toThrow(MalformedDataError);
  });

  it('rejects a non-array top-level value', () => {
    expect(() => parseResponseBody(")]}'\n{\"a\":1}")).toThrow(
      'Unexpected JSON structure: top-level value is not an array',
    );
  });

  it('keeps at most 500 characters of the body on failure', () => {
    const raw = 'x'.repeat(800);
    try {
      parseResponseBody(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedDataError);
      if (err instanceof MalformedDataError) {
        expect(err.body).toBe('x'.repeat(500));
      }
    }
  });
});
