import type { LookupError } from './errors';

export type ToneStyle = 'mark' | 'none';

export type VCharStyle = 'u:' | 'ü';

export type LetterCase = 'lowercase' | 'uppercase';

export interface PinyinFormat {
  readonly name: string;
  readonly tone: ToneStyle;
  readonly vChar: VCharStyle;
  readonly letterCase: LetterCase;
}

export interface FormatPair {
  readonly toned: PinyinFormat;
  readonly toneless: PinyinFormat;
}

export interface HanCharacter {
  readonly codePoint: number;
  readonly text: string;
}

export type Resolution =
  | { kind: 'readings'; readings: readonly string[] }
  | { kind: 'empty' }
  | { kind: 'failure'; error: LookupError };

export interface ReadingsResolver {
  resolve(character: HanCharacter, format: PinyinFormat): Resolution;
}

export interface CharacterRecord {
  withTone: string[];
  withoutTone: string[];
}

export type PinyinDatabase = Map<string, CharacterRecord>;

export interface CodePointRange {
  start: number;
  end: number;
}
