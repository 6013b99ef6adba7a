import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const baseDir = path.dirname(fileURLToPath(import.meta.url));

export const ENV_FILE_PATH = path.resolve(baseDir, "../../.env.local");

/**
 * Load `.env.local` from the repository root into `process.env`.
 * Variables already set in the environment win. Returns the loaded path,
 * or undefined when there is no file.
 */
export function loadEnvFile(envPath: string = ENV_FILE_PATH): string | undefined {
	if (!fs.existsSync(envPath)) return undefined;
	dotenv.config({ path: envPath });
	return envPath;
}
