/**
 * Reads installation configuration files from disk.
 * This is a generic config reader, not tied to the event bus or any specific runtime.
 */
import { readFile } from 'fs/promises';
import { SystemErrorCode } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * A file that does not exist yields an empty object so first runs fall back to defaults.
 * @param configPath string - Path to config file (e.g. './config/config.json')
 * @returns Promise<unknown> - Parsed config document, unvalidated
 * @throws Error if the file cannot be read or parsed, or has an unsupported extension
 * @example
 * const raw = await readConfigFile('./config/config.yaml');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    if (!/\.(json|ya?ml)$/i.test(configPath)) {
        throw new Error(`Unsupported config file format. Use .json or .yaml`);
    }

    let raw: string;
    try {
        raw = await readFile(configPath, `utf-8`);
    } catch(err) {
        if (SystemErrorCode(err) === `ENOENT`) {
            return {};
        }
        throw err;
    }

    if (raw.trim().length === 0) {
        return {};
    }
    if (/\.json$/i.test(configPath)) {
        return JSON.parse(raw);
    }
    // Lazy-load yaml parser only if needed
    const yaml = await import('js-yaml');
    return yaml.load(raw);
}
