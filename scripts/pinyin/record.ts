import { dedupeReadings } from './dedupe';
import type { LookupError } from './errors';
import { DEFAULT_FORMATS } from './formats';
import type { CharacterRecord, FormatPair, HanCharacter, ReadingsResolver } from './types';

export type RecordOutcome =
  | { kind: 'record'; record: CharacterRecord }
  | { kind: 'skipped' }
  | { kind: 'failed'; error: LookupError };

export const buildCharacterRecord = (
  resolver: ReadingsResolver,
  character: HanCharacter,
  formats: FormatPair = DEFAULT_FORMATS
): RecordOutcome => {
  const toned = dedupeReadings(resolver, character, formats.toned);
  if (!toned.ok) {
    return { kind: 'failed', error: toned.error };
  }
  const toneless = dedupeReadings(resolver, character, formats.toneless);
  if (!toneless.ok) {
    return { kind: 'failed', error: toneless.error };
  }

  // Both sides must have data; a one-sided record is never emitted.
  if (!toned.readings.length || !toneless.readings.length) {
    return { kind: 'skipped' };
  }
  return {
    kind: 'record',
    record: { withTone: toned.readings, withoutTone: toneless.readings }
  };
};
