import { renderReading } from './formats';
import { toResolution } from './resolver';
import type { HanCharacter, PinyinFormat, ReadingsResolver, Resolution } from './types';

export interface SampleReadings {
  toned: string[];
  toneless: string[];
}

export type SampleTable = Record<string, SampleReadings>;

export const SAMPLE_READINGS: SampleTable = {
  '中': { toned: ['zhōng', 'zhòng'], toneless: ['zhong'] },
  '乐': { toned: ['lè', 'yuè'], toneless: ['le', 'yue'] },
  '女': { toned: ['nǚ', 'rǔ'], toneless: ['nü', 'ru'] },
  '行': { toned: ['xíng', 'háng'], toneless: ['xing', 'hang'] },
  '重': { toned: ['zhòng', 'chóng'], toneless: ['zhong', 'chong'] }
};

/** Offline resolver over a fixed table, for `--sample` builds. */
export const createSampleResolver = (table: SampleTable = SAMPLE_READINGS): ReadingsResolver => ({
  resolve(character: HanCharacter, format: PinyinFormat): Resolution {
    const entry = table[character.text];
    if (!entry) {
      return { kind: 'empty' };
    }
    const raw = format.tone === 'mark' ? entry.toned : entry.toneless;
    return toResolution(raw.map((reading) => renderReading(reading, format)));
  }
});
