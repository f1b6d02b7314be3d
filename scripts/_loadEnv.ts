import fs from "fs";
import path from "path";
import dotenv from "dotenv";

export const ENV_FILES = [".env.local", ".env"] as const;

/**
 * Load .env.local, then .env, from `root` into process.env.
 * Variables already set win, so .env.local overrides .env and the shell
 * overrides both. Returns the files that were found.
 */
export function loadEnvFiles(root: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ENV_FILES) {
    const full = path.join(root, file);
    if (!fs.existsSync(full)) continue;
    const result = dotenv.config({ path: full });
    if (result.error) {
      throw new Error(`Could not read ${full}: ${result.error.message}`);
    }
    loaded.push(full);
  }
  return loaded;
}
