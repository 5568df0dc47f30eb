/**
 * Centralized Path Management
 *
 * Files that ship beside the code, resolved from this module's location so
 * they are found both from src/ (tests) and from dist/ (built CLI).
 */

import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/ and dist/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * Templates shipped with the package
 */
export const TEMPLATES_DIR = path.join(REPO_ROOT, 'templates');

/**
 * Linkwarden account settings wrapped around the generated collection
 */
export const LINKWARDEN_USER_TEMPLATE = path.join(TEMPLATES_DIR, 'linkwarden-user.json');

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');
