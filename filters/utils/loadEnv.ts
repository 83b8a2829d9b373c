import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

/**
 * Load a .env file into the environment without overriding variables that are
 * already set. Returns the file that was loaded, or null when there is none.
 *
 * Uses dotenv.parse rather than dotenv.config: config may print to stdout,
 * and stdout carries the filtered document.
 */
export function loadEnv(
  envFile: string = path.resolve(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): string | null {
  if (!fs.existsSync(envFile)) {
    return null;
  }
  const parsed = dotenv.parse(fs.readFileSync(envFile));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return envFile;
}
