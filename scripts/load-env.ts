/**
 * Load .env.local (and .env) before anything reads provider settings.
 * Import this first in scripts: import './load-env.js'
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
