import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

/**
 * Loads the first env file found. An explicit ENV_FILE wins over the
 * .env.local / .env lookup in the working directory and its parent.
 * Returns the loaded path, or null when only the process env is used.
 */
export function loadEnv(): string | null {
  const explicit = process.env.ENV_FILE;
  if (explicit) {
    const resolved = path.resolve(explicit);
    if (!fs.existsSync(resolved)) {
      throw new Error(`ENV_FILE not found: ${resolved}`);
    }
    dotenv.config({ path: resolved });
    return resolved;
  }

  const cwd = process.cwd();
  const candidates = [
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '..', '.env.local'),
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '..', '.env')
  ];

  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) return null;
  dotenv.config({ path: envPath });
  return envPath;
}
