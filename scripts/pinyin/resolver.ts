import { pinyin } from 'pinyin-pro';

import { LookupError } from './errors';
import { renderReading } from './formats';
import type { HanCharacter, PinyinFormat, ReadingsResolver, Resolution } from './types';

type PinyinProToneType = 'symbol' | 'none';

type PinyinLookup = (text: string, toneType: PinyinProToneType) => string[];

const ROMANIZATION = /^[\p{Script=Latin}\p{M}]+$/u;

const lookupWithPinyinPro: PinyinLookup = (text, toneType) =>
  pinyin(text, { multiple: true, type: 'array', toneType });

// pinyin-pro echoes characters it has no data for instead of failing.
const isRomanization = (value: string, character: HanCharacter): boolean =>
  value !== character.text && ROMANIZATION.test(value);

export const toResolution = (readings: readonly string[]): Resolution =>
  readings.length ? { kind: 'readings', readings } : { kind: 'empty' };

/**
 * Readings backed by the pinyin-pro dictionary. The lookup is injectable so
 * tests can stand in a failing or scripted backend.
 */
export const createPinyinProResolver = (lookup: PinyinLookup = lookupWithPinyinPro): ReadingsResolver => ({
  resolve(character: HanCharacter, format: PinyinFormat): Resolution {
    let raw: string[];
    try {
      raw = lookup(character.text, format.tone === 'mark' ? 'symbol' : 'none');
    } catch (error) {
      return { kind: 'failure', error: new LookupError(character, format, error) };
    }

    const readings = raw
      .map((value) => value.trim())
      .filter((value) => isRomanization(value, character))
      .map((value) => renderReading(value, format));
    return toResolution(readings);
  }
});
