import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { errorMessage, logger } from './logger.js';

// From src/utils/ or dist/utils/ → package root
const PACKAGE_JSON_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

export function resolvePackageVersion(): string {
    try {
        const packageJson: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
        if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
            && typeof packageJson.version === 'string' && packageJson.version.trim()) {
            return packageJson.version;
        }
    } catch (error) {
        logger.debug('Could not read package version', { packageJsonPath: PACKAGE_JSON_PATH, error: errorMessage(error) });
    }
    return 'unknown';
}
