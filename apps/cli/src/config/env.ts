/**
 * Loads .env from the working directory. Imported ahead of everything else
 * so the logger sees NODE_ENV and LOG_LEVEL from the file.
 */

import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig({ path: resolve(process.cwd(), '.env') });
