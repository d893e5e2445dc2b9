import { config } from "dotenv";
import { existsSync } from "fs";
import { resolve } from "path";

const ENV_FILES = [
  { file: ".env", override: false },
  // Local overrides win over both .env and the shell
  { file: ".env.local", override: true },
] as const;

/**
 * Load the project's env files into process.env and return the paths that
 * were found.
 */
export function loadEnv(rootDir: string): string[] {
  const loaded: string[] = [];
  for (const { file, override } of ENV_FILES) {
    const path = resolve(rootDir, file);
    if (!existsSync(path)) continue;
    config({ path, override });
    loaded.push(path);
  }
  return loaded;
}
