#!/usr/bin/env tsx
import { LOG_TAG, resolveBuildOptions } from './config';
import { build } from './pipeline';

const main = async (): Promise<void> => {
  try {
    await build(resolveBuildOptions());
  } catch (error) {
    console.error(`${LOG_TAG} ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
};

void main();
