import { dirname, join } from 'node:path';

import { assemblePinyinDatabase, formatCodePoint } from './assemble';
import { LOG_TAG, type BuildOptions } from './config';
import { createPinyinProResolver } from './resolver';
import { createSampleResolver } from './sample';
import {
  assertWritable,
  createManifest,
  describeArtifact,
  writeDatabaseJson,
  writeGzipJson,
  writeManifest,
  writeSqlite,
  type ArtifactEntry,
  type BuildManifest
} from './serialize';
import type { ReadingsResolver } from './types';

const createResolver = (options: BuildOptions): ReadingsResolver =>
  options.mode === 'sample' ? createSampleResolver() : createPinyinProResolver();

const sqlitePathFor = (outputPath: string): string => outputPath.replace(/\.json$/i, '') + '.sqlite';

export interface BuildResult {
  manifest: BuildManifest;
  manifestPath: string;
}

export const build = async (options: BuildOptions): Promise<BuildResult> => {
  console.log(`${LOG_TAG} Building pinyin database (${options.mode})`);
  console.log(`${LOG_TAG} Range: ${formatCodePoint(options.start)} - ${formatCodePoint(options.end)}`);
  console.log(`${LOG_TAG} Output: ${options.outputPath}`);

  const { database, stats } = assemblePinyinDatabase(createResolver(options), {
    range: { start: options.start, end: options.end },
    progressInterval: options.progressInterval,
    onProgress: ({ processed, total, recorded, character }) => {
      console.log(`${LOG_TAG} ${processed}/${total} scanned (${recorded} recorded, at ${character.text})`);
    },
    onFailure: ({ character, error }) => {
      console.warn(`${LOG_TAG} Skipping ${character.text} (${formatCodePoint(character.codePoint)}): ${error.message}`);
    }
  });

  const gzipPath = `${options.outputPath}.gz`;
  const sqlitePath = sqlitePathFor(options.outputPath);
  assertWritable(
    [options.outputPath, ...(options.gzip ? [gzipPath] : []), ...(options.sqlite ? [sqlitePath] : [])],
    options.force
  );

  const artifacts: ArtifactEntry[] = [];
  await writeDatabaseJson(database, options.outputPath, options.force);
  artifacts.push(await describeArtifact('json', options.outputPath));

  if (options.gzip) {
    await writeGzipJson(database, gzipPath, options.force);
    artifacts.push(await describeArtifact('json.gz', gzipPath));
  }
  if (options.sqlite) {
    await writeSqlite(database, sqlitePath, options.force);
    artifacts.push(await describeArtifact('sqlite', sqlitePath));
  }

  const manifestPath = join(dirname(options.outputPath), 'manifest.json');
  const manifest = createManifest(options.mode, stats, artifacts);
  await writeManifest(manifest, manifestPath);

  console.log(`${LOG_TAG} Scanned ${stats.scanned} code points.`);
  console.log(`${LOG_TAG} Recorded ${stats.recorded} characters (${stats.skipped} without readings, ${stats.failed} failed).`);
  artifacts.forEach((artifact) => {
    console.log(`${LOG_TAG} Wrote ${artifact.file} (~${Math.round(artifact.bytes / 1024)} KB).`);
  });
  console.log(`${LOG_TAG} Manifest written to ${manifestPath}`);
  return { manifest, manifestPath };
};
