/**
 * Centralized Path Management
 *
 * Single source of truth for repository-relative paths.
 */

import path from 'path';
import { fileURLToPath } from 'url';

// Get the directory containing this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/ or dist/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');
