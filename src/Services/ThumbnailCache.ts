/**
 * File-based preview cache: one file per asset, named after the asset id.
 */
import { rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import fs from 'fs-extra';
import { SystemErrorCode } from '../Common/Errors.js';

/**
 * ThumbnailCache manages the per-asset preview files under the thumbnails directory.
 * The path of an entry is a function of the asset id only, so rewriting an entry replaces it in place.
 */
export class ThumbnailCache {
    /** Directory for cache files [// absolute path] */
    private _cacheDir: string;
    /** Extension of every entry, including the dot */
    private _extension: string;

    /**
     * @param cacheDir string - Directory to store cache files (e.g. '<root>/.asset_db/thumbnails')
     * @param extension string - Entry extension (default '.png')
     */
    constructor(cacheDir: string, extension: string = `.png`) {
        this._cacheDir = cacheDir;
        this._extension = extension;
    }

    /**
     * Writes an entry. Data goes to a temporary sibling first, then replaces the entry,
     * so readers never observe a half-written preview.
     * @param assetId string - Asset id
     * @param data Buffer - Encoded preview
     * @example
     * await cache.write('4f1c...', png);
     */
    async write(assetId: string, data: Buffer): Promise<string> {
        const filePath = this.pathFor(assetId);
        const temp = `${filePath}.tmp`;
        await fs.ensureDir(path.dirname(filePath));
        try {
            await writeFile(temp, data);
            await rename(temp, filePath);
        } catch(err) {
            await fs.remove(temp);
            throw err;
        }
        return filePath;
    }

    /**
     * Removes an entry.
     * @returns Promise<boolean> - Whether an entry existed
     */
    async remove(assetId: string): Promise<boolean> {
        try {
            await unlink(this.pathFor(assetId));
            return true;
        } catch(err) {
            if (SystemErrorCode(err) === `ENOENT`) {
                return false;
            }
            throw err;
        }
    }

    /** Absolute path of the entry for an asset id. */
    pathFor(assetId: string): string {
        return path.join(this._cacheDir, `${assetId}${this._extension}`);
    }
}
