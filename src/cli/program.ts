// src/cli/program.ts - Commander program factory

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as fs from 'fs/promises';

import { Logger, LogLevel } from '../utils/logger.js';
import { registerCoreCommands } from './commands/register-core.js';

function parseLogLevel(value: string): LogLevel {
  const level = Logger.parseLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError('Expected one of: debug, info, warn, error');
  }
  return level;
}

async function readVersion(): Promise<string> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export async function createProgram(): Promise<Command> {
  const version = await readVersion();
  const program = new Command();

  program
    .name('transport-gate')
    .version(`transport-gate v${version}`, '-v, --version')
    .description('Quality gate for tabular transport datasets')
    .option('--log-level <level>', 'debug | info | warn | error', parseLogLevel)
    .exitOverride();

  program.hook('preAction', (thisCommand) => {
    const { logLevel } = thisCommand.opts<{ logLevel?: LogLevel }>();
    if (logLevel !== undefined) {
      Logger.setLevel(logLevel);
    }
  });

  registerCoreCommands(program);

  return program;
}

export { CommanderError };
