import { describe, expect, test } from 'vitest';
import { parseResponse } from '../../services/providers';
import { MalformedResponseError } from '../../utils/errors';

describe('parseResponse', () => {
  test('parses plain JSON', () => {
    expect(parseResponse('{"characters": []}')).toEqual({ characters: [] });
  });

  test('strips markdown code fences', () => {
    expect(parseResponse('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  test('falls back to the outermost braces inside prose', () => {
    expect(parseResponse('Here you go: {"a": {"b": 2}} Hope this helps!')).toEqual({ a: { b: 2 } });
  });

  test('rejects text with no JSON object', () => {
    expect(() => parseResponse('I cannot help with that.')).toThrow(MalformedResponseError);
  });

  test('rejects truncated JSON', () => {
    expect(() => parseResponse('{"characters": [')).toThrow(MalformedResponseError);
  });
});
