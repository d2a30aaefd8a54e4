import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

type Env = Record<string, string | undefined>;

/**
 * Load variables from the first .env file that exists among the candidates.
 *
 * Values already present in `env` are kept; the file only fills gaps.
 * Returns the path that was loaded, or null when none was found.
 */
export function loadEnvFile(candidatePaths: string[], env: Env = process.env): string | null {
  for (const envPath of candidatePaths) {
    if (!envPath || !fs.existsSync(envPath)) {
      continue;
    }

    const parsed = dotenv.parse(fs.readFileSync(envPath, 'utf8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    console.log(`[Main] Loaded .env from: ${path.resolve(envPath)}`);
    return envPath;
  }

  return null;
}
