import path from 'path';

import type { S3Client } from '@aws-sdk/client-s3';
import chalk from 'chalk';
import ora from 'ora';

import { formatSize } from '@bucketferry/common';
import { BucketFerryError, toError } from '@bucketferry/errors';
import { ensureWritableDirectory, fileExists } from '@bucketferry/files';
import { LoggerFactory, type LogLevelString, type Logger } from '@bucketferry/logging';
import {
  ResumableTransferEngine,
  S3StorageProvider,
  createS3Client,
  type S3ConnectionOptions,
  type StorageProvider,
} from '@bucketferry/transfer';

import { DEFAULT_CONFIG_PATH, loadAppConfig, writeDefaultConfig } from '../config/loader.js';
import type { AppConfig } from '../config/schema.js';
import { ignoreRulesFromConfig } from '../core/bucket-filter.js';
import { PostTransferDeleter } from '../core/deleter.js';
import { DownloadOrchestrator, type RunFailure, type RunSummary } from '../core/orchestrator.js';
import { SignalHandler } from '../utils/signal-handler.js';

export interface RunOptions {
  config?: string;
  target?: string;
  delete?: boolean;
  dryRun?: boolean;
  concurrency?: number;
  logLevel?: LogLevelString;
}

export interface InitOptions {
  output?: string;
  force?: boolean;
}

/**
 * How `run` reaches S3; replaced in tests
 */
export interface RunDependencies {
  createClient(options: S3ConnectionOptions): S3Client;
  createProvider(client: S3Client, logger: Logger): StorageProvider;
}

export const defaultRunDependencies: RunDependencies = {
  createClient: createS3Client,
  createProvider: (client, logger) => new S3StorageProvider(client, logger),
};

/**
 * Command line flags take precedence over the configuration file
 */
export function applyRunOverrides(config: AppConfig, options: RunOptions): AppConfig {
  return {
    ...config,
    ...(options.target !== undefined && { target_path: options.target }),
    ...(options.delete !== undefined && { delete_after_download: options.delete }),
    ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
    logging: {
      ...config.logging,
      ...(options.logLevel !== undefined && { level: options.logLevel }),
    },
  };
}

export function failureTarget(failure: RunFailure): string {
  if (failure.bucket === undefined) {
    return 'bucket list';
  }
  return failure.key === undefined ? failure.bucket : `${failure.bucket}/${failure.key}`;
}

/**
 * Line reported once configuration has been resolved
 */
export function configurationStatus(configPath: string, found: boolean): string {
  return found
    ? `Configuration loaded from ${configPath}`
    : `No configuration file at ${configPath}, using defaults`;
}

/**
 * Any failed object or bucket listing makes the run unsuccessful
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.failures.length > 0 || summary.cancelled ? 1 : 0;
}

export class CLICommands {
  /**
   * Run command - download every included bucket into the target directory
   */
  static async run(
    options: RunOptions,
    dependencies: RunDependencies = defaultRunDependencies
  ): Promise<void> {
    const configPath = options.config ?? DEFAULT_CONFIG_PATH;
    const spinner = ora('Loading configuration...').start();

    let config: AppConfig;
    try {
      const found = await fileExists(configPath);
      config = applyRunOverrides(await loadAppConfig(configPath), options);
      if (found) {
        spinner.succeed(configurationStatus(configPath, true));
      } else {
        spinner.warn(configurationStatus(configPath, false));
      }
    } catch (error) {
      spinner.fail('Configuration could not be loaded');
      CLICommands.fail(error);
      return;
    }

    const logger = LoggerFactory.fromConfig('bucketferry', {
      level: config.logging.level,
      format: config.logging.format,
      maxSize: config.logging.max_size,
      maxFiles: config.logging.max_files,
      ...(config.logging.file && { file: config.logging.file }),
    });
    const signals = new SignalHandler().install();
    let client: S3Client | undefined;

    try {
      const targetPath = path.resolve(config.target_path);
      if (!options.dryRun) {
        await ensureWritableDirectory(targetPath);
      }

      client = dependencies.createClient({
        ...(config.aws.region && { region: config.aws.region }),
        ...(config.aws.endpoint && { endpoint: config.aws.endpoint }),
        ...(config.aws.force_path_style !== undefined && {
          forcePathStyle: config.aws.force_path_style,
        }),
      });
      const provider = dependencies.createProvider(client, logger.child('s3'));
      const orchestrator = new DownloadOrchestrator(
        provider,
        new ResumableTransferEngine(provider, {
          segmentSize: config.segment_size,
          logger: logger.child('transfer'),
        }),
        new PostTransferDeleter(provider, logger.child('delete')),
        {
          targetPath,
          ignoreRules: ignoreRulesFromConfig(config.ignore_pattern),
          deleteAfterDownload: config.delete_after_download,
          concurrency: config.concurrency,
          retry: {
            maxAttempts: config.retry.max_attempts,
            baseDelayMs: config.retry.base_delay_ms,
            maxDelayMs: config.retry.max_delay_ms,
          },
          dryRun: options.dryRun ?? false,
        },
        logger
      );

      logger.info(
        `Downloading into ${targetPath}${config.delete_after_download ? ' (deleting after download)' : ''}`
      );
      const summary = await orchestrator.run(signals.signal);

      CLICommands.printSummary(summary, options.dryRun ?? false);
      process.exitCode = exitCodeFor(summary);
    } catch (error) {
      logger.error('Run failed', error);
      CLICommands.fail(error);
    } finally {
      client?.destroy();
      signals.uninstall();
      await logger.close();
    }
  }

  /**
   * Init command - write a default configuration file
   */
  static async init(options: InitOptions): Promise<void> {
    const outputPath = options.output ?? DEFAULT_CONFIG_PATH;

    try {
      await writeDefaultConfig(outputPath, { force: options.force ?? false });
      console.log(chalk.green(`Configuration written to ${outputPath}`));
    } catch (error) {
      CLICommands.fail(error);
    }
  }

  static printSummary(summary: RunSummary, dryRun: boolean): void {
    console.log('\n' + chalk.bold.green(dryRun ? 'Dry Run Summary' : 'Download Summary'));
    console.log(
      chalk.cyan(
        `Buckets: ${summary.bucketsProcessed} processed, ${summary.bucketsSkipped} skipped, ${summary.bucketsFailed} failed`
      )
    );

    if (dryRun) {
      console.log(chalk.blue(`Objects to download: ${summary.objectsPlanned}`));
    } else {
      console.log(chalk.green(`Completed: ${summary.objectsCompleted}`));
      console.log(chalk.red(`Failed: ${summary.objectsFailed}`));
      console.log(chalk.blue(`Transferred: ${formatSize(summary.bytesTransferred, 1)}`));
      console.log(chalk.gray(`Directories created: ${summary.directoriesCreated}`));
      if (summary.deletions > 0 || summary.deletionFailures > 0) {
        console.log(
          chalk.magenta(`Deleted: ${summary.deletions} (${summary.deletionFailures} failed)`)
        );
      }
    }

    if (summary.cancelled) {
      console.log(
        chalk.yellow.bold(`Interrupted: ${summary.objectsNotStarted} objects were not started`)
      );
    }

    if (summary.failures.length > 0) {
      console.log(chalk.gray('\nFailures:'));
      for (const failure of summary.failures) {
        const target = failureTarget(failure);
        console.log(chalk.gray(`  ${target}: ${failure.reason} (${failure.message})`));
      }
    }
  }

  private static fail(error: unknown): void {
    const err = toError(error);
    const code = err instanceof BucketFerryError ? ` [${err.code}]` : '';
    console.error(chalk.red(`Error${code}: ${err.message}`));
    process.exitCode = 1;
  }
}
