import { loadEnv } from "../infra/dotenv.js";

// Imported first by the CLI so LOG_FORMAT and LOG_LEVEL from .env reach the logger
export const envFiles = loadEnv(process.cwd());
