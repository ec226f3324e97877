// src/cli/commands/init.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_CONFIG_FILE } from '../../config/gate-config-loader.js';
import { Logger } from '../../utils/logger.js';

const TEMPLATE_URL = new URL('../../../defaults/transport-gate.example.yml', import.meta.url);

export interface InitOptions {
  force?: boolean;
}

/**
 * Writes the annotated example config into the working directory.
 */
export async function initCommand(basePath: string, options: InitOptions = {}): Promise<void> {
  const target = path.join(basePath, DEFAULT_CONFIG_FILE);

  if ((await fileExists(target)) && !options.force) {
    Logger.error(`${DEFAULT_CONFIG_FILE} already exists. Use --force to overwrite.`);
    process.exit(1);
  }

  const template = await fs.readFile(TEMPLATE_URL, 'utf-8');
  await fs.writeFile(target, template, 'utf-8');

  Logger.success(`Created ${DEFAULT_CONFIG_FILE}`);
  console.log('\nNext steps:');
  console.log(`  1. Edit ${DEFAULT_CONFIG_FILE} to match your dataset columns`);
  console.log('  2. transport-gate rules');
  console.log('  3. transport-gate run <dataset.csv|dataset.xlsx>\n');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
