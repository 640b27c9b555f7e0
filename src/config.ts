import * as fs from 'fs';
import * as yaml from 'yaml';
import { type DelegateConfig, DelegateConfigSchema } from './types.js';
import { logger } from './logger.js';
import { isTruthyEnv } from './utils.js';

let activeConfig: DelegateConfig = DelegateConfigSchema.parse({});

export function loadConfig(configPath: string): DelegateConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    // An empty file parses to null; treat it as "all defaults".
    const parsedYaml: unknown = yaml.parse(fileContents) ?? {};

    const config = DelegateConfigSchema.parse(parsedYaml);

    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
      metadata: { error },
    });
    throw error;
  }
}

/**
 * Make `config` the process-wide configuration.
 *
 * Logger settings apply immediately (`DELEGATE_TRACE` keeps console output on); `remove_matching` applies to delegates
 * constructed afterwards.
 */
export function configure(config: DelegateConfig): void {
  activeConfig = config;
  logger.setConsoleOutputEnabled(config.trace || isTruthyEnv('DELEGATE_TRACE'));
  logger.setConsoleTypes(config.trace_types);
}

export function getConfig(): DelegateConfig {
  return activeConfig;
}
