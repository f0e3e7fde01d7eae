/**
 * Loads .env into process.env as a side effect of being imported.
 *
 * Import it ahead of every other module that reads process.env at load time
 * (the logger reads LOG_LEVEL and NODE_ENV when it is created).
 * DOTENV_CONFIG_PATH points at another file than ./.env.
 */
import dotenv from 'dotenv';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });
