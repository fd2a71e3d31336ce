import { describe, it, expect, vi } from 'vitest';
import {
  CJK_UNIFIED_END,
  CJK_UNIFIED_SIZE,
  CJK_UNIFIED_START,
  assemblePinyinDatabase,
  formatCodePoint,
  toCharacter,
  type AssembleProgress
} from './assemble';
import { ConfigError, LookupError } from './errors';
import { createSampleResolver } from './sample';
import { serializeDatabase } from './serialize';
import type { ReadingsResolver } from './types';

const everyCharacter: ReadingsResolver = {
  resolve: (character, format) => ({
    kind: 'readings',
    readings: [format.tone === 'mark' ? `yī${character.codePoint}` : `yi${character.codePoint}`]
  })
};

const failingAt = (inner: ReadingsResolver, text: string): ReadingsResolver => ({
  resolve: (character, format) =>
    character.text === text
      ? { kind: 'failure', error: new LookupError(character, format, new Error('injected')) }
      : inner.resolve(character, format)
});

describe('assemblePinyinDatabase', () => {
  it('scans the whole block once in ascending order', () => {
    const { database, stats, failures } = assemblePinyinDatabase(everyCharacter);
    const keys = Array.from(database.keys());

    expect(CJK_UNIFIED_SIZE).toBe(20992);
    expect(stats).toEqual({
      start: 0x4e00,
      end: 0x9fff,
      scanned: CJK_UNIFIED_SIZE,
      recorded: CJK_UNIFIED_SIZE,
      skipped: 0,
      failed: 0
    });
    expect(failures).toEqual([]);
    expect(database.size).toBe(stats.recorded);
    expect(keys[0]).toBe('一');
    expect(keys[keys.length - 1]).toBe(String.fromCodePoint(0x9fff));

    const codePoints = keys.map((key) => key.codePointAt(0) ?? 0);
    expect(codePoints.every((codePoint) => codePoint >= CJK_UNIFIED_START && codePoint <= CJK_UNIFIED_END)).toBe(true);
    expect(codePoints.every((codePoint, index) => index === 0 || codePoint > codePoints[index - 1])).toBe(true);
  });

  it('records only characters with readings in both formats', () => {
    const { database, stats } = assemblePinyinDatabase(createSampleResolver());

    expect(Array.from(database.keys())).toEqual(['中', '乐', '女', '行', '重']);
    expect(stats.recorded).toBe(5);
    expect(stats.skipped).toBe(CJK_UNIFIED_SIZE - 5);
    expect(database.size).toBe(stats.recorded);
    database.forEach((record) => {
      expect(record.withTone.length).toBeGreaterThan(0);
      expect(record.withoutTone.length).toBeGreaterThan(0);
      expect(new Set(record.withTone).size).toBe(record.withTone.length);
      expect(new Set(record.withoutTone).size).toBe(record.withoutTone.length);
    });
  });

  it('keeps polyphonic readings in resolver order', () => {
    const { database } = assemblePinyinDatabase(createSampleResolver());
    expect(database.get('重')).toEqual({ withTone: ['zhòng', 'chóng'], withoutTone: ['zhong', 'chong'] });
    expect(database.get('女')).toEqual({ withTone: ['nǔ:', 'rǔ'], withoutTone: ['nu:', 'ru'] });
  });

  it('collapses duplicate readings', () => {
    const resolver = createSampleResolver({ '乐': { toned: ['lè', 'lè', 'yuè'], toneless: ['le', 'yue'] } });
    const { database } = assemblePinyinDatabase(resolver, { range: { start: 0x4e50, end: 0x4e50 } });
    expect(database.get('乐')).toEqual({ withTone: ['lè', 'yuè'], withoutTone: ['le', 'yue'] });
  });

  it('leaves out characters with no data or one-sided data', () => {
    const resolver = createSampleResolver({
      '中': { toned: ['zhōng'], toneless: [] },
      '丰': { toned: [], toneless: [] }
    });
    const { database, stats } = assemblePinyinDatabase(resolver, { range: { start: 0x4e2d, end: 0x4e30 } });
    expect(database.size).toBe(0);
    expect(stats).toEqual({ start: 0x4e2d, end: 0x4e30, scanned: 4, recorded: 0, skipped: 4, failed: 0 });
  });

  it('contains a lookup failure to its own character', () => {
    const sample = createSampleResolver();
    const onFailure = vi.fn();
    const clean = assemblePinyinDatabase(sample);
    const faulty = assemblePinyinDatabase(failingAt(sample, '乐'), { onFailure });

    expect(Array.from(faulty.database.keys())).toEqual(['中', '女', '行', '重']);
    expect(faulty.stats.failed).toBe(1);
    expect(faulty.stats.scanned).toBe(CJK_UNIFIED_SIZE);
    expect(faulty.failures).toHaveLength(1);
    expect(faulty.failures[0]?.character).toEqual({ codePoint: 0x4e50, text: '乐' });
    expect(faulty.failures[0]?.error).toBeInstanceOf(LookupError);
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith(faulty.failures[0]);

    faulty.database.forEach((record, character) => {
      expect(record).toEqual(clean.database.get(character));
    });
  });

  it('contains a resolver that throws', () => {
    const sample = createSampleResolver();
    const throwing: ReadingsResolver = {
      resolve: (character, format) => {
        if (character.text === '乐') {
          throw new Error('table corrupted');
        }
        return sample.resolve(character, format);
      }
    };

    const { database, stats, failures } = assemblePinyinDatabase(throwing);
    expect(Array.from(database.keys())).toEqual(['中', '女', '行', '重']);
    expect(stats.failed).toBe(1);
    expect(stats.recorded).toBe(4);
    expect(stats.scanned).toBe(CJK_UNIFIED_SIZE);
    expect(failures[0]?.error).toBeInstanceOf(LookupError);
    expect(failures[0]?.error.message).toBe('Lookup failed for 乐 (toned): table corrupted');
  });

  it('keeps a thrown LookupError as the failure cause', () => {
    const sample = createSampleResolver();
    const thrown: LookupError[] = [];
    const throwing: ReadingsResolver = {
      resolve: (character, format) => {
        if (character.text === '乐' && format.tone === 'none') {
          const error = new LookupError(character, format, 'boom');
          thrown.push(error);
          throw error;
        }
        return sample.resolve(character, format);
      }
    };

    const { stats, failures } = assemblePinyinDatabase(throwing);
    expect(stats.failed).toBe(1);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.error).toBe(thrown[0]);
  });

  it('produces identical output on repeated runs', () => {
    const first = assemblePinyinDatabase(createSampleResolver());
    const second = assemblePinyinDatabase(createSampleResolver());
    expect(serializeDatabase(second.database)).toBe(serializeDatabase(first.database));
  });

  it('reports progress without changing the counts', () => {
    const progress: AssembleProgress[] = [];
    const { stats } = assemblePinyinDatabase(everyCharacter, {
      range: { start: 0x4e00, end: 0x4e09 },
      progressInterval: 4,
      onProgress: (update) => progress.push(update)
    });

    expect(progress.map(({ processed, total, recorded }) => [processed, total, recorded])).toEqual([
      [4, 10, 4],
      [8, 10, 8],
      [10, 10, 10]
    ]);
    expect(progress[0]?.character).toEqual({ codePoint: 0x4e03, text: '七' });
    expect(stats.scanned).toBe(10);
    expect(stats.recorded).toBe(10);
  });

  it('rejects ranges outside the block', () => {
    expect(() => assemblePinyinDatabase(everyCharacter, { range: { start: 0x4dff, end: 0x4e00 } })).toThrow(ConfigError);
    expect(() => assemblePinyinDatabase(everyCharacter, { range: { start: 0x9fff, end: 0xa000 } })).toThrow(ConfigError);
  });

  it('rejects a reversed range', () => {
    expect(() => assemblePinyinDatabase(everyCharacter, { range: { start: 0x4e10, end: 0x4e00 } })).toThrow(
      'Range start U+4E10 is after end U+4E00'
    );
  });

  it('rejects a non-positive progress interval', () => {
    expect(() => assemblePinyinDatabase(everyCharacter, { progressInterval: 0 })).toThrow(ConfigError);
  });
});

describe('toCharacter', () => {
  it('builds a character inside the block', () => {
    expect(toCharacter(0x4e00)).toEqual({ codePoint: 0x4e00, text: '一' });
  });

  it('refuses code points outside the block', () => {
    expect(() => toCharacter(0x3400)).toThrow('U+3400 is not a CJK Unified Ideograph code point');
  });
});

describe('formatCodePoint', () => {
  it('pads to four hex digits', () => {
    expect(formatCodePoint(0x4e2d)).toBe('U+4E2D');
    expect(formatCodePoint(0x41)).toBe('U+0041');
  });
});
