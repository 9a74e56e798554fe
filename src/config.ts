/**
 * Configuration Loader
 * Loads config from config.json, validates it and applies environment variables
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Config, LogLevelName } from './types';
import { ConfigValidatorService } from './services/config-validator.service';

// Load .env file
dotenv.config();

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

/**
 * Load configuration from config.json
 */
export function getConfig(
  configPath: string = path.join(__dirname, '..', 'config.json'),
  env: NodeJS.ProcessEnv = process.env,
): Config {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const configFile = fs.readFileSync(configPath, 'utf-8');
  const raw: unknown = JSON.parse(configFile);

  ConfigValidatorService.validateAtStartup(raw);
  const config: Config = raw;

  // Secrets come from the environment only
  if (env.TELEGRAM_TOKEN) {
    config.telegram.botToken = env.TELEGRAM_TOKEN;
  }
  if (env.TELEGRAM_CHAT_ID) {
    config.telegram.chatId = env.TELEGRAM_CHAT_ID;
  }
  if (env.TWELVE_API_KEY) {
    config.feed.apiKey = env.TWELVE_API_KEY;
  }

  const level = env.LOG_LEVEL?.toUpperCase();
  if (level !== undefined) {
    const match = LOG_LEVEL_NAMES.find(name => name === level);
    if (!match) {
      throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL} (expected ${LOG_LEVEL_NAMES.join(', ')})`);
    }
    config.logging.level = match;
  }

  return config;
}
