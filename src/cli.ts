#!/usr/bin/env node
import dotenv from 'dotenv';
import { ConfigManager } from './config/configManager';
import { ConfigError, describeError } from './errors';
import { CommunityDownloader } from './zenodo';
import { FetchLike } from './zenodo/types';
import { Logger, logger } from './utils/logger';
import { ENV_KEYS } from './config/default';

export interface CliOptions {
  debug: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { debug: false };

  for (const arg of args) {
    if (arg === '--debug') {
      options.debug = true;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}. Usage: iodp-zenodo-downloader [--debug]`);
    }
  }

  return options;
}

/**
 * Runs one download pass and resolves to the process exit code.
 */
export async function main(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  fetchImpl?: FetchLike,
  configPath?: string
): Promise<number> {
  const level = Logger.parseLevel(env[ENV_KEYS.LOG_LEVEL]);
  if (level !== undefined) {
    logger.setLogLevel(level);
  }

  logger.header('IODP Zenodo Downloader');

  let downloader: CommunityDownloader;
  let outputDir: string;
  try {
    const options = parseArgs(args);
    const config = await new ConfigManager(configPath, env).loadConfig({ debug: options.debug });
    if (config.debug) {
      logger.warn('DEBUG MODE ENABLED - limited downloads for testing');
    }
    downloader = new CommunityDownloader(config, fetchImpl);
    outputDir = config.outputDir;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Failed to load configuration:', error);
    }
    return 1;
  }

  try {
    const result = await downloader.run();

    logger.section('Summary');
    logger.stats({
      'Records processed': result.recordsProcessed,
      'Records failed': result.recordsFailed,
      'Files downloaded': result.filesDownloaded,
      'Files skipped': result.filesSkipped,
      'Files failed': result.filesFailed,
      Duration: `${(result.duration / 1000).toFixed(1)}s`,
    });

    if (result.success) {
      logger.success(`Download complete! Data saved to ${outputDir}`);
    } else {
      logger.warn(
        `Finished with ${result.errors.length} problem(s); re-run to retry the missing files`
      );
    }
    return 0;
  } catch (error) {
    logger.error(`Run aborted: ${describeError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();

  process.on('unhandledRejection', error => {
    logger.error('Unhandled rejection:', error);
    process.exit(1);
  });

  main(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      logger.error('Unexpected failure:', error);
      process.exit(1);
    }
  );
}
