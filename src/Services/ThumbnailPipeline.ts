/**
 * Derives cached previews for library content.
 *
 * Images are decoded, fitted inside the target size (aspect ratio kept, never enlarged) and
 * re-encoded as PNG. Videos contribute their first readable frame, which then goes through the
 * image path. Folders and other file types map to a shared type icon rendered once per size.
 *
 * Generation is best-effort: any decode or IO failure yields `undefined` and nothing is written.
 */
import { mkdtemp, readFile, rename } from 'fs/promises';
import { tmpdir } from 'os';
import { extname, join } from 'path';
import { fileURLToPath } from 'url';
import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs-extra';
import sharp from 'sharp';
import type { AssetKind } from '../Domain/Asset.js';
import type { ThumbnailGenerator, ThumbnailSize } from '../Domain/Repository.js';
import { DescribeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { MetricsService } from './MetricsService.js';
import type { PathManager } from './PathManager.js';
import { ThumbnailCache } from './ThumbnailCache.js';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([`.jpg`, `.jpeg`, `.png`, `.webp`, `.gif`, `.tif`, `.tiff`, `.avif`, `.svg`]);
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([`.mp4`, `.mov`, `.m4v`, `.mkv`, `.webm`, `.avi`, `.mpg`, `.mpeg`, `.wmv`]);

/** Shared icons shipped under assets/icons. */
export type TypeIcon = `folder` | `file` | `audio` | `model` | `archive` | `document`;

const ICON_BY_EXTENSION: Record<string, TypeIcon> = {
    '.wav': `audio`,
    '.mp3': `audio`,
    '.ogg': `audio`,
    '.flac': `audio`,
    '.fbx': `model`,
    '.obj': `model`,
    '.glb': `model`,
    '.gltf': `model`,
    '.blend': `model`,
    '.uasset': `model`,
    '.umap': `model`,
    '.zip': `archive`,
    '.rar': `archive`,
    '.7z': `archive`,
    '.tar': `archive`,
    '.gz': `archive`,
    '.txt': `document`,
    '.md': `document`,
    '.pdf': `document`,
    '.json': `document`,
};

const DEFAULT_ICON_DIR = fileURLToPath(new URL(`../../assets/icons/`, import.meta.url));

/** How a preview is obtained for a given source. */
export type PreviewPlan = { source: `image` } | { source: `video` } | { source: `icon`; icon: TypeIcon };

/**
 * Chooses the preview strategy from the asset kind and file extension.
 * @example
 * PlanPreview('/in/rock.PNG', 'file'); // { source: 'image' }
 * PlanPreview('/in/pack', 'directory'); // { source: 'icon', icon: 'folder' }
 */
export function PlanPreview(sourcePath: string, kind: AssetKind): PreviewPlan {
    switch (kind) {
        case `directory`:
            return { source: `icon`, icon: `folder` };
        case `file`: {
            const extension = extname(sourcePath).toLowerCase();

            if (IMAGE_EXTENSIONS.has(extension)) {
                return { source: `image` };
            }
            if (VIDEO_EXTENSIONS.has(extension)) {
                return { source: `video` };
            }
            return { source: `icon`, icon: ICON_BY_EXTENSION[extension] ?? `file` };
        }
    }
}

/** Pulls a still image out of a video. */
export interface FrameExtractor {
    /** @returns Buffer - Encoded image of the first readable frame */
    extractFirstFrame(videoPath: string): Promise<Buffer>;
}

/**
 * FrameExtractor backed by the ffmpeg binary through fluent-ffmpeg.
 * The binary is looked up on PATH unless `ffmpegPath` (or FFMPEG_PATH) says otherwise.
 */
export class FfmpegFrameExtractor implements FrameExtractor {
    constructor(ffmpegPath: string | undefined = process.env.FFMPEG_PATH) {
        if (ffmpegPath) {
            ffmpeg.setFfmpegPath(ffmpegPath);
        }
    }

    async extractFirstFrame(videoPath: string): Promise<Buffer> {
        const folder = await mkdtemp(join(tmpdir(), `asset-frame-`));
        const filename = `frame.png`;

        try {
            await new Promise<void>((resolve, reject) => {
                ffmpeg(videoPath)
                    .on(`end`, () => {
                        resolve();
                    })
                    .on(`error`, (err: Error) => {
                        reject(err);
                    })
                    .screenshots({ timestamps: [0], filename, folder });
            });
            return await readFile(join(folder, filename));
        } finally {
            await fs.remove(folder);
        }
    }
}

export interface ThumbnailPipelineOptions {
    frameExtractor?: FrameExtractor;
    metrics?: MetricsService;
    /** Directory holding `<icon>.svg` sources (defaults to the packaged assets/icons). */
    iconSourceDir?: string;
}

export class ThumbnailPipeline implements ThumbnailGenerator {
    private readonly _paths: PathManager;
    private readonly _cache: ThumbnailCache;
    private readonly _frames: FrameExtractor;
    private readonly _metrics?: MetricsService;
    private readonly _iconSourceDir: string;

    constructor(paths: PathManager, options: ThumbnailPipelineOptions = {}) {
        this._paths = paths;
        this._cache = new ThumbnailCache(paths.ThumbnailsDir());
        this._frames = options.frameExtractor ?? new FfmpegFrameExtractor();
        this._metrics = options.metrics;
        this._iconSourceDir = options.iconSourceDir ?? DEFAULT_ICON_DIR;
    }

    /**
     * Produces the preview for `sourcePath`. The source file is only read.
     * @returns string | undefined - Root-relative thumbnail path, or undefined on failure
     */
    async generate(sourcePath: string, kind: AssetKind, assetId: string, targetSize: ThumbnailSize): Promise<string | undefined> {
        const plan = PlanPreview(sourcePath, kind);

        try {
            const written = await this._render(plan, sourcePath, assetId, targetSize);
            this._metrics?.Inc(`thumbnailsGenerated`);
            return this._paths.Relative(written);
        } catch(err) {
            this._metrics?.Inc(`thumbnailFailures`);
            log.warning(`Thumbnail generation failed for ${sourcePath}: ${DescribeError(err)}`, `ThumbnailPipeline`, assetId);
            return undefined;
        }
    }

    async remove(assetId: string): Promise<void> {
        await this._cache.remove(assetId);
    }

    pathFor(assetId: string): string {
        return this._paths.Relative(this._cache.pathFor(assetId));
    }

    /**
     * Decodes an image and fits it inside `size` as PNG.
     * Output is a pure function of the input bytes and size.
     */
    static async Encode(input: string | Buffer, size: ThumbnailSize): Promise<Buffer> {
        return sharp(input)
            .rotate()
            .resize({ width: size.width, height: size.height, fit: `inside`, withoutEnlargement: true })
            .png({ compressionLevel: 9 })
            .toBuffer();
    }

    private async _render(plan: PreviewPlan, sourcePath: string, assetId: string, size: ThumbnailSize): Promise<string> {
        switch (plan.source) {
            case `image`:
                return this._cache.write(assetId, await ThumbnailPipeline.Encode(sourcePath, size));
            case `video`: {
                const frame = await this._frames.extractFirstFrame(sourcePath);
                return this._cache.write(assetId, await ThumbnailPipeline.Encode(frame, size));
            }
            case `icon`:
                return this._icon(plan.icon, size);
        }
    }

    /** Renders a type icon at `size` once and reuses it for every asset of that type. */
    private async _icon(icon: TypeIcon, size: ThumbnailSize): Promise<string> {
        const target = join(this._paths.IconsDir(), `${icon}_${size.width}x${size.height}.png`);

        if (await fs.pathExists(target)) {
            return target;
        }
        const temp = `${target}.tmp`;
        try {
            await sharp(join(this._iconSourceDir, `${icon}.svg`))
                .resize({ width: size.width, height: size.height, fit: `contain`, background: { r: 0, g: 0, b: 0, alpha: 0 } })
                .png()
                .toFile(temp);
            await rename(temp, target);
        } catch(err) {
            await fs.remove(temp);
            throw err;
        }
        return target;
    }
}
