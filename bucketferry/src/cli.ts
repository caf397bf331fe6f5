#!/usr/bin/env node

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

import { isLogLevel } from '@bucketferry/logging';

import { CLICommands } from './cli/commands.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8')
);
const version =
  packageJson && typeof packageJson === 'object' && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseLevel(value: string): string {
  const level = value.toUpperCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Must be one of DEBUG, INFO, WARN, ERROR.');
  }
  return level;
}

const program = new Command();

program
  .name('bucketferry')
  .description('Mirror every S3 bucket of an account to a local directory with resumable downloads')
  .version(version);

program
  .command('run', { isDefault: true })
  .description('Download all objects of every bucket not excluded by the ignore patterns')
  .option('-c, --config <path>', 'Path to configuration file', 'config.yaml')
  .option('-t, --target <path>', 'Override the download directory')
  .option('--delete', 'Delete each object from S3 after a complete download')
  .option('--no-delete', 'Keep objects in S3 regardless of the configuration')
  .option('--dry-run', 'List what would be downloaded without transferring anything')
  .option('--concurrency <number>', 'Objects downloaded at once per bucket', parsePositiveInt)
  .option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR', parseLevel)
  .action(async (options: Record<string, unknown>) => {
    const level = options['logLevel'];
    const concurrency = options['concurrency'];
    const target = options['target'];
    const config = options['config'];
    await CLICommands.run({
      ...(typeof config === 'string' && { config }),
      ...(typeof target === 'string' && { target }),
      ...(typeof options['delete'] === 'boolean' && { delete: options['delete'] }),
      dryRun: options['dryRun'] === true,
      ...(typeof concurrency === 'number' && { concurrency }),
      ...(typeof level === 'string' && isLogLevel(level) && { logLevel: level }),
    });
  });

program
  .command('init')
  .description('Write a default configuration file')
  .option('-o, --output <path>', 'Output path for the configuration', 'config.yaml')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: { output: string; force?: boolean }) => {
    await CLICommands.init({ output: options.output, force: options.force ?? false });
  });

process.on('unhandledRejection', reason => {
  console.error(chalk.red('Unhandled rejection:'), reason);
  process.exit(1);
});

await program.parseAsync();
