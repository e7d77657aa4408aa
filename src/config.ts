import * as fs from 'fs';
import * as yaml from 'yaml';
import { SimConfig, SimConfigSchema } from './types.js';
import { logger } from './logger.js';
import { formatZodIssues } from './utils.js';

/**
 * Parse and validate a YAML config document. An empty document yields the defaults.
 */
export function parseConfig(text: string): SimConfig {
  const raw: unknown = yaml.parse(text) ?? {};
  const parsed = SimConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid simulation config: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadConfig(configPath: string): SimConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = parseConfig(fileContents);

    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${message}`,
      metadata: { error: message },
    });
    throw error;
  }
}
