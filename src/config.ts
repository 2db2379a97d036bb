import * as fs from 'fs';
import * as yaml from 'yaml';
import { GameRuleError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { validateRoleSetup } from './roles.js';
import { type GameConfig, GameConfigSchema } from './types.js';

/** Validates an already-parsed config object; cross-field rules beyond the schema live here. */
export function parseConfig(raw: unknown): GameConfig {
  const result = GameConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new GameRuleError('InvalidConfig', `Invalid configuration: ${detail}`, { cause: result.error });
  }
  const config = result.data;

  const names = config.players.map(p => p.name.trim());
  if (new Set(names).size !== names.length) {
    throw new GameRuleError('InvalidConfig', 'Player names must be distinct.');
  }
  if (config.roles) validateRoleSetup(config.roles, config.players.length);
  return config;
}

export function loadConfig(configPath: string): GameConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = parseConfig(yaml.parse(fileContents));

    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${errorMessage(error)}`,
      metadata: { error },
    });
    throw error;
  }
}
