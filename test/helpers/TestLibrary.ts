import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import fs from 'fs-extra';
import type { AssetKind } from '../../src/Domain/Asset.js';
import type { ThumbnailGenerator, ThumbnailSize } from '../../src/Domain/Repository.js';
import type { PathManager } from '../../src/Services/PathManager.js';
import type { ValidatedConfig } from '../../src/Types/Config.js';

/** Fresh directory under the OS temp dir. */
export async function MakeTempDir(prefix = `asset-test-`): Promise<string> {
    return mkdtemp(join(tmpdir(), prefix));
}

export function TestConfig(libraryPath: string | undefined, overrides: Partial<ValidatedConfig> = {}): ValidatedConfig {
    return {
        libraryPath,
        defaultCategory: `Default`,
        autoGenerateThumbnail: true,
        thumbnailSize: { width: 64, height: 64 },
        logLevel: `debug`,
        importMode: `copy`,
        storeBackupCount: 2,
        ...overrides,
    };
}

/** Writes `files` (relative path -> contents) beneath `root`. */
export async function WriteTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [relative, contents] of Object.entries(files)) {
        await fs.outputFile(join(root, relative), contents);
    }
}

/** Sequential ids: id-0001, id-0002, ... */
export function SequentialIds(prefix = `id-`): () => string {
    let next = 0;
    return () => {
        next++;
        return `${prefix}${String(next).padStart(4, `0`)}`;
    };
}

/** Clock advancing one second per call from a fixed start. */
export function SteppingClock(start = Date.UTC(2024, 0, 1, 12, 0, 0)): () => Date {
    let tick = 0;
    return () => {
        return new Date(start + 1000 * tick++);
    };
}

/**
 * ThumbnailGenerator stand-in writing a small marker file per asset.
 * Sources whose name contains `broken` yield no thumbnail.
 */
export class StubThumbnails implements ThumbnailGenerator {
    public calls: { sourcePath: string; kind: AssetKind; assetId: string }[] = [];
    public removed: string[] = [];
    private readonly _paths: PathManager;

    constructor(paths: PathManager) {
        this._paths = paths;
    }

    async generate(sourcePath: string, kind: AssetKind, assetId: string, targetSize: ThumbnailSize): Promise<string | undefined> {
        this.calls.push({ sourcePath, kind, assetId });
        if (sourcePath.includes(`broken`)) {
            return undefined;
        }
        await fs.outputFile(this._paths.Resolve(this.pathFor(assetId)), `thumb:${assetId}:${targetSize.width}x${targetSize.height}`);
        return this.pathFor(assetId);
    }

    async remove(assetId: string): Promise<void> {
        this.removed.push(assetId);
        await fs.remove(this._paths.Resolve(this.pathFor(assetId)));
    }

    pathFor(assetId: string): string {
        return `.asset_db/thumbnails/${assetId}.png`;
    }
}
