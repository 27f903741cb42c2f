import * as fs from 'fs';
import * as yaml from 'yaml';
import { type AgentConfig, AgentConfigSchema } from './types.js';
import { logger } from './logger.js';
import { describeError } from './utils.js';

export function parseConfig(source: string): AgentConfig {
  const parsedYaml: unknown = yaml.parse(source);
  return AgentConfigSchema.parse(parsedYaml);
}

export function loadConfig(configPath: string): AgentConfig {
  logger.log({ type: 'SYSTEM', content: `Loading agent configuration from ${configPath}` });

  try {
    const config = parseConfig(fs.readFileSync(configPath, 'utf-8'));
    logger.log({ type: 'SYSTEM', content: `Configuration loaded for agent ${config.name}.` });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${describeError(error)}`,
      metadata: { error },
    });
    throw error;
  }
}
