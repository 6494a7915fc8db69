import { join } from 'path';
import fs from 'fs-extra';
import type { Asset } from '../Domain/Asset.js';
import { DescribeError } from '../Common/Errors.js';
import { FormatSize } from '../Common/Format.js';
import { log } from '../Common/Log.js';
import type { PathManager } from './PathManager.js';

const RULE = `=`.repeat(50);

/**
 * Plain-text info sheet for an asset, with space left for usage notes.
 * Timestamps are printed in UTC.
 */
export function RenderAssetDocument(asset: Asset): string {
    const created = asset.createdAt.toISOString().slice(0, 19).replace(`T`, ` `);

    return [
        `Asset information`,
        RULE,
        ``,
        `Name: ${asset.name}`,
        `ID: ${asset.id}`,
        `Type: ${asset.kind}`,
        `Category: ${asset.category}`,
        `Path: ${asset.libraryPath}`,
        `Size: ${FormatSize(asset.sizeBytes)}`,
        `Created: ${created} UTC`,
        `Tags: ${asset.tags.length > 0 ? asset.tags.join(`, `) : `-`}`,
        ``,
        `Description:`,
        asset.description || `-`,
        ``,
        RULE,
        ``,
        `Usage:`,
        ``,
        ``,
        `Notes:`,
        ``,
    ].join(`\n`);
}

/** Writes and removes the per-asset info sheets under `.asset_db/documents`. */
export class AssetDocumentWriter {
    private readonly _paths: PathManager;

    constructor(paths: PathManager) {
        this._paths = paths;
    }

    pathFor(assetId: string): string {
        return join(this._paths.DocumentsDir(), `${assetId}.txt`);
    }

    /**
     * Best-effort: a failed write is logged and reported as undefined.
     * @returns string | undefined - Absolute path of the written sheet
     */
    async write(asset: Asset): Promise<string | undefined> {
        const target = this.pathFor(asset.id);

        try {
            await fs.outputFile(target, RenderAssetDocument(asset), `utf-8`);
            log.info(`Created info sheet ${target}`, `AssetDocumentWriter`, asset.id);
            return target;
        } catch(err) {
            log.warning(`Could not write info sheet ${target}: ${DescribeError(err)}`, `AssetDocumentWriter`, asset.id);
            return undefined;
        }
    }

    /** Best-effort removal; a missing sheet is not an error. */
    async remove(assetId: string): Promise<void> {
        try {
            await fs.remove(this.pathFor(assetId));
        } catch(err) {
            log.warning(`Could not remove info sheet for ${assetId}: ${DescribeError(err)}`, `AssetDocumentWriter`, assetId);
        }
    }
}
