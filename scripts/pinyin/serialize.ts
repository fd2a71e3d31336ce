import { createHash } from 'node:crypto';
import { createWriteStream, existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';

import Database from 'better-sqlite3';

import type { AssembleStats } from './assemble';
import type { BuildMode } from './config';
import { ArtifactWriteError } from './errors';
import type { CharacterRecord, PinyinDatabase } from './types';

export type ArtifactFormat = 'json' | 'json.gz' | 'sqlite';

export interface ArtifactEntry {
  format: ArtifactFormat;
  file: string;
  bytes: number;
  sha256: string;
}

export interface BuildManifest {
  generatedAt: string;
  mode: BuildMode;
  range: { start: string; end: string };
  scanned: number;
  recorded: number;
  failed: number;
  artifacts: ArtifactEntry[];
}

interface CharacterRow {
  codePoint: number;
  character: string;
  withTone: string;
  withoutTone: string;
}

// Character keys are never array indices, so object key order follows insertion.
export const toSerializable = (database: PinyinDatabase): Record<string, CharacterRecord> =>
  Object.fromEntries(database);

export const serializeDatabase = (database: PinyinDatabase): string =>
  `${JSON.stringify(toSerializable(database), null, 2)}\n`;

const temporaryPathFor = (filePath: string): string =>
  join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);

/** Fails before anything is written if any target exists and force is off. */
export const assertWritable = (filePaths: string[], force: boolean): void => {
  if (force) {
    return;
  }
  const existing = filePaths.find((filePath) => existsSync(filePath));
  if (existing) {
    throw new ArtifactWriteError(existing, new Error('File already exists. Use --force to overwrite.'));
  }
};

const ensureWritable = async (filePath: string, force: boolean): Promise<void> => {
  assertWritable([filePath], force);
  try {
    await mkdir(dirname(filePath), { recursive: true });
  } catch (error) {
    throw new ArtifactWriteError(filePath, error);
  }
};

/**
 * Runs `write` against a temporary sibling of `filePath` and renames it into
 * place. On failure the temporary file is removed and nothing appears at
 * `filePath`.
 */
const writeAtomically = async (
  filePath: string,
  force: boolean,
  write: (temporaryPath: string) => Promise<void>
): Promise<string> => {
  await ensureWritable(filePath, force);
  const temporaryPath = temporaryPathFor(filePath);
  try {
    await write(temporaryPath);
    await rename(temporaryPath, filePath);
  } catch (error) {
    await rm(temporaryPath, { force: true });
    throw error instanceof ArtifactWriteError ? error : new ArtifactWriteError(filePath, error);
  }
  return filePath;
};

export const writeDatabaseJson = async (database: PinyinDatabase, filePath: string, force: boolean): Promise<string> =>
  writeAtomically(filePath, force, async (temporaryPath) => {
    await writeFile(temporaryPath, serializeDatabase(database), 'utf-8');
  });

export const writeGzipJson = async (database: PinyinDatabase, filePath: string, force: boolean): Promise<string> =>
  writeAtomically(filePath, force, async (temporaryPath) => {
    const gzip = createGzip({ level: 9 });
    const input = Readable.from([serializeDatabase(database)]);
    const output = createWriteStream(temporaryPath);
    await pipeline(input, gzip, output);
  });

const toRows = (database: PinyinDatabase): CharacterRow[] =>
  Array.from(database, ([character, record]) => ({
    codePoint: character.codePointAt(0) ?? 0,
    character,
    withTone: JSON.stringify(record.withTone),
    withoutTone: JSON.stringify(record.withoutTone)
  }));

export const writeSqlite = async (database: PinyinDatabase, filePath: string, force: boolean): Promise<string> =>
  writeAtomically(filePath, force, async (temporaryPath) => {
    const db = new Database(temporaryPath);
    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS characters (
          code_point INTEGER PRIMARY KEY,
          character TEXT NOT NULL UNIQUE,
          with_tone TEXT NOT NULL,
          without_tone TEXT NOT NULL
        );
      `);

      const insert = db.prepare(
        `INSERT INTO characters (code_point, character, with_tone, without_tone)
         VALUES (@codePoint, @character, @withTone, @withoutTone);`
      );
      const insertMany = db.transaction((rows: CharacterRow[]) => {
        rows.forEach((row) => {
          insert.run(row);
        });
      });
      insertMany(toRows(database));
    } finally {
      db.close();
    }
  });

export const checksum = async (filePath: string): Promise<string> => {
  const hash = createHash('sha256');
  const data = await readFile(filePath);
  hash.update(data);
  return hash.digest('hex');
};

export const describeArtifact = async (format: ArtifactFormat, filePath: string): Promise<ArtifactEntry> => {
  const stats = await stat(filePath);
  return {
    format,
    file: basename(filePath),
    bytes: stats.size,
    sha256: await checksum(filePath)
  };
};

export const createManifest = (mode: BuildMode, stats: AssembleStats, artifacts: ArtifactEntry[]): BuildManifest => ({
  generatedAt: new Date().toISOString(),
  mode,
  range: {
    start: stats.start.toString(16),
    end: stats.end.toString(16)
  },
  scanned: stats.scanned,
  recorded: stats.recorded,
  failed: stats.failed,
  artifacts
});

export const writeManifest = async (manifest: BuildManifest, filePath: string): Promise<string> =>
  writeAtomically(filePath, true, async (temporaryPath) => {
    await writeFile(temporaryPath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf-8');
  });
