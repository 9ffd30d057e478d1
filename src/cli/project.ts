/**
 * Shared CLI setup: config, log level and entity loading.
 */
import * as path from 'node:path';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { loadEntityFiles } from '../core/ast/loader.js';
import type { Entity } from '../core/ast/types.js';
import { globFiles } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { PgMutateError, SystemError, ErrorCodes } from '../utils/errors.js';

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

export interface LoadedProject {
  projectRoot: string;
  config: Config;
  files: string[];
  entities: Entity[];
}

/**
 * Log level from the config file, overridden by --verbose / --quiet.
 */
export function applyLogLevel(config: Config, options: GlobalOptions): void {
  if (options.quiet) {
    logger.setLevel('error');
  } else if (options.verbose) {
    logger.setLevel('debug');
  } else {
    logger.setLevel(config.logging.level);
  }
}

/**
 * Load config and apply the log level.
 */
export async function loadCliConfig(options: GlobalOptions, projectRoot: string = process.cwd()): Promise<Config> {
  const config = await loadConfig(projectRoot, options.config);
  applyLogLevel(config, options);
  return config;
}

/**
 * Expand file arguments (paths or glob patterns) into YAML files.
 */
export async function resolveEntityFiles(patterns: string[], projectRoot: string): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    if (/[*?[\]{}]/.test(pattern)) {
      const matches = await globFiles(pattern, { cwd: projectRoot });
      matches.filter((file) => /\.ya?ml$/.test(file)).forEach((file) => files.add(file));
    } else {
      files.add(path.resolve(projectRoot, pattern));
    }
  }
  return [...files];
}

/**
 * Load config and every entity named by the file arguments.
 */
export async function loadProject(patterns: string[], options: GlobalOptions): Promise<LoadedProject> {
  const projectRoot = process.cwd();
  const config = await loadCliConfig(options, projectRoot);
  const files = await resolveEntityFiles(patterns, projectRoot);
  if (files.length === 0) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `No entity files match: ${patterns.join(', ')}`, { patterns });
  }

  logger.debug(`Loading ${files.length} entity file(s)`, { files });
  const entities = await loadEntityFiles(files);
  return { projectRoot, config, files, entities };
}

/**
 * Log an error and exit with status 1.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof PgMutateError) {
    logger.error(`${error.code}: ${error.message}`);
  } else {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(1);
}
