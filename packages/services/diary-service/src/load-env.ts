/**
 * Loads `.env` from the working directory without overriding variables already set.
 * Imported first by main.ts so module-level loggers see LOG_LEVEL and NODE_ENV.
 */

import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(process.cwd(), '.env'), override: false });
