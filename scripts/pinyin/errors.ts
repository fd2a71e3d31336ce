import type { HanCharacter, PinyinFormat } from './types';

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

export class LookupError extends Error {
  readonly character: HanCharacter;
  readonly format: PinyinFormat;

  constructor(character: HanCharacter, format: PinyinFormat, cause: unknown) {
    super(`Lookup failed for ${character.text} (${format.name}): ${describeCause(cause)}`, { cause });
    this.name = 'LookupError';
    this.character = character;
    this.format = format;
  }
}

export class ArtifactWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'ArtifactWriteError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
