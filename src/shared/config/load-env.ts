import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';

const logger = new Logger('LoadEnv');

export function loadEnv(): void {
  const nodeEnv = process.env.NODE_ENV || 'development';
  // ENV_FILE wins; otherwise .env.prod for production, .env.local for dev, .env for the rest.
  let envFile = process.env.ENV_FILE;

  if (!envFile) {
    if (nodeEnv === 'production') {
      envFile = '.env.prod';
    } else if (nodeEnv === 'development') {
      envFile = '.env.local';
    } else {
      envFile = '.env';
    }
  }

  const envPath = path.resolve(process.cwd(), envFile);

  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    logger.log(`Loaded environment from ${envFile}`);
    return;
  }

  const defaultEnvPath = path.resolve(process.cwd(), '.env');
  if (fs.existsSync(defaultEnvPath)) {
    dotenv.config({ path: defaultEnvPath });
    logger.log('Loaded environment from .env (fallback)');
  } else {
    logger.warn(
      `Environment file ${envFile} not found and no .env fallback available.`,
    );
  }
}
