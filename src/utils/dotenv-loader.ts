import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import { createLogger } from './logger.js';

const logger = createLogger('dotenv');

/**
 * Where to look for a .env file, most specific first: DOTENV_PATH, the
 * working directory, then the project root relative to the compiled CLI
 * (src/cli or dist/cli).
 */
export const getDotenvCandidatePaths = (moduleDir: string, cwd: string): string[] => {
  const candidates = [
    process.env.DOTENV_PATH,
    path.resolve(cwd, '.env'),
    path.resolve(moduleDir, '../../.env'),
  ].filter((candidate): candidate is string => Boolean(candidate));

  return Array.from(new Set(candidates));
};

/**
 * Load the first .env file found. Variables already set in the environment
 * are never overridden. Returns the file that was loaded, if any.
 */
export const loadDotenv = (moduleDir: string, cwd: string = process.cwd()): string | undefined => {
  const envPath = getDotenvCandidatePaths(moduleDir, cwd).find((candidate) => fs.existsSync(candidate));
  if (!envPath) {
    logger.debug({ moduleDir, cwd }, 'No .env file found');
    return undefined;
  }

  const result = dotenv.config({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
  logger.debug({ envPath }, 'Loaded .env file');
  return envPath;
};
