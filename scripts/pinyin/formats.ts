import type { FormatPair, PinyinFormat } from './types';

export const TONED_FORMAT: PinyinFormat = Object.freeze({
  name: 'toned',
  tone: 'mark',
  vChar: 'u:',
  letterCase: 'lowercase'
});

export const TONELESS_FORMAT: PinyinFormat = Object.freeze({
  name: 'toneless',
  tone: 'none',
  vChar: 'u:',
  letterCase: 'lowercase'
});

export const DEFAULT_FORMATS: FormatPair = Object.freeze({
  toned: TONED_FORMAT,
  toneless: TONELESS_FORMAT
});

// ü carrying a tone mark keeps the mark on the u when spelled as "u:".
const MARKED_U_COLON: Record<string, string> = {
  'ǖ': 'ū:',
  'ǘ': 'ú:',
  'ǚ': 'ǔ:',
  'ǜ': 'ù:',
  'ü': 'u:'
};

const applyVChar = (reading: string, format: PinyinFormat): string => {
  if (format.vChar === 'ü') {
    return reading;
  }
  return reading.replace(/[ǖǘǚǜü]/g, (vowel) => MARKED_U_COLON[vowel] ?? vowel);
};

const applyCase = (reading: string, format: PinyinFormat): string =>
  format.letterCase === 'uppercase' ? reading.toUpperCase() : reading.toLowerCase();

/**
 * Renders a raw pinyin syllable (as produced with "ü" and tone marks or no
 * tones) into the spelling a format asks for.
 */
export const renderReading = (reading: string, format: PinyinFormat): string =>
  applyCase(applyVChar(reading.normalize('NFC').trim(), format), format);
