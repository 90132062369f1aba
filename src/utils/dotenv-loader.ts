import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';

export const getDotenvCandidatePaths = (baseDir: string, cwd: string): string[] => {
  const fromEnv = process.env.DOTENV_PATH;
  const candidates: string[] = [];

  if (fromEnv) {
    candidates.push(fromEnv);
  }

  candidates.push(path.resolve(cwd, '.env'));

  // Compiled entrypoints live in dist/cli, so the package root is two levels up.
  candidates.push(path.resolve(baseDir, '../../.env'));

  return Array.from(new Set(candidates));
};

export const loadDotenv = (baseDir: string): string | undefined => {
  // Keep dotenv non-destructive: never override already-set variables.
  const candidates = getDotenvCandidatePaths(baseDir, process.cwd());
  const envPath = candidates.find((p) => fs.existsSync(p));

  if (envPath) {
    dotenv.config({ path: envPath, override: false });
    return envPath;
  }

  dotenv.config({ override: false });
  return undefined;
};
