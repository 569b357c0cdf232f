import { createHash } from 'node:crypto';
import { describe, expect, test } from 'vitest';
import {
  canonicalName,
  cleanText,
  generateEntityId,
  isPlaceholderRole,
} from '../../services/entityMerger';

describe('canonicalName', () => {
  test('lowercases, strips parentheticals and collapses whitespace', () => {
    expect(canonicalName('  Dr.  WATSON (narrator) ')).toBe('dr. watson');
  });

  test('strips full-width parentheticals', () => {
    expect(canonicalName('约翰（旁白者）')).toBe('约翰');
    expect(canonicalName('约翰 (旁白者)')).toBe('约翰');
  });

  test('strips nested parentheticals as one aside', () => {
    expect(canonicalName('John (the (old) man)')).toBe('john');
    expect(canonicalName('John (the (old) man) Smith')).toBe('john smith');
  });

  test('keeps a name that is only a parenthetical', () => {
    expect(canonicalName('(The  Stranger)')).toBe('(the stranger)');
    expect(canonicalName('（旁白）')).toBe('（旁白）');
  });
});

describe('cleanText', () => {
  test('removes markdown emphasis, headers and escaped newlines', () => {
    expect(cleanText('## Heading\n**bold** and *it* and __u__\\nnext')).toBe(
      'Heading bold and it and u next',
    );
  });

  test('returns an empty string for missing text', () => {
    expect(cleanText(undefined)).toBe('');
  });
});

describe('generateEntityId', () => {
  test('uses the first 8 hex chars of the md5 of the display name', () => {
    const expected = createHash('md5').update('Ann').digest('hex').slice(0, 8);

    expect(generateEntityId('char', 'Ann')).toBe(`char_${expected}`);
    expect(generateEntityId('char', 'Ann')).not.toBe(generateEntityId('char', 'Bob'));
  });

  test('falls back for empty names', () => {
    expect(generateEntityId('loc', '')).toBe('loc_unknown');
  });
});

describe('isPlaceholderRole', () => {
  test.each(['', 'Not specified', 'unspecified', '未指定', undefined])('%s is a placeholder', (role) => {
    expect(isPlaceholderRole(role)).toBe(true);
  });

  test('a real role is not a placeholder', () => {
    expect(isPlaceholderRole('Protagonist')).toBe(false);
  });
});
