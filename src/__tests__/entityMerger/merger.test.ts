import { describe, expect, test } from 'vitest';
import {
  canonicalName,
  createSnapshot,
  generateEntityId,
  mergeDescriptions,
  mergeOccupations,
  mergeSnapshots,
  mergeThemes,
  normalizeExtraction,
} from '../../services/entityMerger';
import type { Extraction } from '../../types/analysis';
import { makeCharacter, makeSnapshot } from '../helpers/fixtures';

describe('mergeSnapshots', () => {
  test('merges "约翰" and "约翰 (旁白者)" from different chunks into one character', () => {
    const first = normalizeExtraction({
      characters: [{ name: '约翰 (旁白者)', role: '未指定', description: '一个叙述者' }],
    });
    const second = normalizeExtraction({
      characters: [{ name: '约翰', role: '主角', description: '住在城里' }],
    });

    const merged = mergeSnapshots(mergeSnapshots(createSnapshot('书', '作者'), first), second);

    expect(merged.characters).toHaveLength(1);
    const [character] = merged.characters ?? [];
    expect(canonicalName(character.name)).toBe('约翰');
    expect(character).toEqual({
      id: generateEntityId('char', '约翰 (旁白者)'),
      name: '约翰',
      role: '主角',
      description: '一个叙述者 住在城里',
      occupation: [],
    });
  });

  test('merging an empty extraction leaves the snapshot unchanged', () => {
    const snapshot = makeSnapshot(30, {
      summary: 'So far',
      themes: ['Loss'],
      timeline: [{ sequence: 1, event: 'Arrival', percent: 10 }],
    });

    expect(mergeSnapshots(snapshot, {})).toEqual(snapshot);
  });

  test('does not mutate its inputs', () => {
    const snapshot = makeSnapshot(10);
    const extraction: Extraction = { characters: [makeCharacter('Bob')] };
    const before = structuredClone(snapshot);

    mergeSnapshots(snapshot, extraction);

    expect(snapshot).toEqual(before);
  });

  test('keeps first-occurrence order', () => {
    const snapshot = makeSnapshot(10, { characters: [makeCharacter('Ann'), makeCharacter('Bob')] });

    const merged = mergeSnapshots(snapshot, {
      characters: [makeCharacter('Cat'), makeCharacter('ann')],
    });

    expect(merged.characters?.map((c) => c.name)).toEqual(['Ann', 'Bob', 'Cat']);
  });

  test('appends timeline events with positional sequence and the chunk percent', () => {
    const snapshot = makeSnapshot(10, { timeline: [{ sequence: 1, event: 'a' }] });

    const merged = mergeSnapshots(
      snapshot,
      { timeline: [{ event: 'b' }, { event: 'c', sequence: 7, percent: 12 }] },
      { percent: 30 },
    );

    expect(merged.timeline).toEqual([
      { sequence: 1, event: 'a' },
      { sequence: 2, event: 'b', percent: 30 },
      { sequence: 7, event: 'c', percent: 12 },
    ]);
  });

  test('fills title and author only when empty', () => {
    const extraction: Extraction = { bookTitle: 'Found', author: 'Someone' };

    const blank = mergeSnapshots(createSnapshot('', ''), extraction);
    const named = mergeSnapshots(createSnapshot('Mine', 'Me'), extraction);

    expect([blank.bookTitle, blank.author]).toEqual(['Found', 'Someone']);
    expect([named.bookTitle, named.author]).toEqual(['Mine', 'Me']);
  });

  test('newest non-empty summary wins', () => {
    const snapshot = makeSnapshot(10, { summary: 'Old' });

    expect(mergeSnapshots(snapshot, { summary: 'New' }).summary).toBe('New');
    expect(mergeSnapshots(snapshot, { summary: '' }).summary).toBe('Old');
  });

  test('collapses empty collections to absent', () => {
    const merged = mergeSnapshots(createSnapshot('T', 'A'), { themes: [' '] });

    expect(merged.themes).toBeUndefined();
    expect(merged.characters).toBeUndefined();
  });
});

describe('entity refinement', () => {
  test('a shorter name replaces the existing one', () => {
    const snapshot = makeSnapshot(0, { characters: [makeCharacter('Captain Ahab (of the Pequod)')] });

    const merged = mergeSnapshots(snapshot, {
      characters: [makeCharacter('Captain Ahab'), makeCharacter('Captain  Ahab')],
    });

    expect(merged.characters?.map((c) => c.name)).toEqual(['Captain Ahab']);
  });

  test('role is adopted only over a placeholder', () => {
    const placeholder = makeSnapshot(0, { characters: [makeCharacter('Ann', { role: 'Not specified' })] });
    const known = makeSnapshot(0, { characters: [makeCharacter('Ann', { role: 'Narrator' })] });
    const incoming: Extraction = { characters: [makeCharacter('Ann', { role: 'Villain' })] };

    expect(mergeSnapshots(placeholder, incoming).characters?.[0].role).toBe('Villain');
    expect(mergeSnapshots(known, incoming).characters?.[0].role).toBe('Narrator');
  });

  test('locations keep the first importance and merge descriptions', () => {
    const snapshot = makeSnapshot(0, {
      locations: [{ id: 'loc_1', name: 'Harbor', description: 'Busy port.', importance: 'Opening scene' }],
    });

    const merged = mergeSnapshots(snapshot, {
      locations: [{ id: 'loc_2', name: 'harbor', description: 'Smells of tar.', importance: 'Later' }],
    });

    expect(merged.locations).toEqual([
      { id: 'loc_1', name: 'Harbor', description: 'Busy port. Smells of tar.', importance: 'Opening scene' },
    ]);
  });
});

describe('mergeDescriptions', () => {
  test('skips a description whose opening is already present', () => {
    const existing = 'A tall man with a scar across his left cheek and a limp.';

    expect(mergeDescriptions(existing, `${existing} He is kind.`)).toBe(existing);
  });

  test('appends cleaned new text', () => {
    expect(mergeDescriptions('Brave.', '**Loyal** to the king')).toBe('Brave. Loyal to the king');
  });

  test('ignores empty additions', () => {
    expect(mergeDescriptions('Brave.', '  ')).toBe('Brave.');
  });
});

describe('mergeOccupations', () => {
  test('unions case-insensitively in first-seen order', () => {
    expect(mergeOccupations(['Soldier'], ['soldier', 'Poet'])).toEqual(['Soldier', 'Poet']);
  });
});

describe('mergeThemes', () => {
  test('trims and deduplicates', () => {
    expect(mergeThemes(['Love'], [' Love ', 'War', ''])).toEqual(['Love', 'War']);
  });
});
