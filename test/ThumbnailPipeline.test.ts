import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import fs from 'fs-extra';
import sharp from 'sharp';
import { PlanPreview, ThumbnailPipeline } from '../src/Services/ThumbnailPipeline.js';
import type { FrameExtractor } from '../src/Services/ThumbnailPipeline.js';
import { PathManager } from '../src/Services/PathManager.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { MakeTempDir } from './helpers/TestLibrary.js';

const SIZE = { width: 64, height: 64 };

async function solidPng(width: number, height: number): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } })
        .png()
        .toBuffer();
}

class StubFrames implements FrameExtractor {
    public calls: string[] = [];
    private readonly _frame?: Buffer;

    constructor(frame?: Buffer) {
        this._frame = frame;
    }

    async extractFirstFrame(videoPath: string): Promise<Buffer> {
        this.calls.push(videoPath);
        if (!this._frame) {
            throw new Error('no decodable frame');
        }
        return this._frame;
    }
}

describe('PlanPreview', () => {
    it('should pick the strategy from kind and extension', () => {
        expect(PlanPreview('/in/rock.PNG', 'file')).toEqual({ source: 'image' });
        expect(PlanPreview('/in/clip.mp4', 'file')).toEqual({ source: 'video' });
        expect(PlanPreview('/in/song.wav', 'file')).toEqual({ source: 'icon', icon: 'audio' });
        expect(PlanPreview('/in/data.xyz', 'file')).toEqual({ source: 'icon', icon: 'file' });
        expect(PlanPreview('/in/pack.png', 'directory')).toEqual({ source: 'icon', icon: 'folder' });
    });
});

describe('ThumbnailPipeline', () => {
    let root: string;
    let sources: string;
    let paths: PathManager;
    let metrics: MetricsService;

    beforeEach(async () => {
        root = await MakeTempDir();
        sources = await MakeTempDir('asset-src-');
        paths = new PathManager(root);
        metrics = new MetricsService();
    });

    afterEach(async () => {
        await fs.remove(root);
        await fs.remove(sources);
    });

    it('should fit images inside the target size keeping the aspect ratio', async () => {
        const source = join(sources, 'wide.png');
        await writeFile(source, await solidPng(400, 200));
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames(), metrics });

        const result = await pipeline.generate(source, 'file', 'asset-1', SIZE);

        expect(result).toBe('.asset_db/thumbnails/asset-1.png');
        const meta = await sharp(paths.Resolve('.asset_db/thumbnails/asset-1.png')).metadata();
        expect(meta.format).toBe('png');
        expect(meta.width).toBe(64);
        expect(meta.height).toBe(32);
        expect(metrics.Snapshot().thumbnailsGenerated).toBe(1);
    });

    it('should never enlarge small images', async () => {
        const source = join(sources, 'tiny.png');
        await writeFile(source, await solidPng(20, 10));
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });

        await pipeline.generate(source, 'file', 'asset-1', SIZE);

        const meta = await sharp(paths.Resolve(pipeline.pathFor('asset-1'))).metadata();
        expect(meta.width).toBe(20);
        expect(meta.height).toBe(10);
    });

    it('should produce identical bytes at the same path when run twice', async () => {
        const source = join(sources, 'wide.png');
        await writeFile(source, await solidPng(300, 120));
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });

        const first = await pipeline.generate(source, 'file', 'asset-1', SIZE);
        const firstBytes = await readFile(paths.Resolve(pipeline.pathFor('asset-1')));
        const second = await pipeline.generate(source, 'file', 'asset-1', SIZE);
        const secondBytes = await readFile(paths.Resolve(pipeline.pathFor('asset-1')));

        expect(second).toBe(first);
        expect(secondBytes.equals(firstBytes)).toBe(true);
    });

    it('should not touch the source file', async () => {
        const source = join(sources, 'wide.png');
        const original = await solidPng(300, 120);
        await writeFile(source, original);
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });

        await pipeline.generate(source, 'file', 'asset-1', SIZE);

        expect((await readFile(source)).equals(original)).toBe(true);
    });

    it('should use the first video frame as an image', async () => {
        const frames = new StubFrames(await solidPng(320, 320));
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: frames });
        const source = join(sources, 'clip.mp4');
        await writeFile(source, 'not really a video');

        const result = await pipeline.generate(source, 'file', 'asset-2', SIZE);

        expect(frames.calls).toEqual([source]);
        expect(result).toBe('.asset_db/thumbnails/asset-2.png');
        const meta = await sharp(paths.Resolve('.asset_db/thumbnails/asset-2.png')).metadata();
        expect(meta.width).toBe(64);
        expect(meta.height).toBe(64);
    });

    it('should return undefined and write nothing when decoding fails', async () => {
        const source = join(sources, 'bad.png');
        await writeFile(source, 'this is not a png');
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames(), metrics });

        const result = await pipeline.generate(source, 'file', 'asset-3', SIZE);

        expect(result).toBeUndefined();
        expect(await fs.pathExists(paths.Resolve(pipeline.pathFor('asset-3')))).toBe(false);
        expect(metrics.Snapshot().thumbnailFailures).toBe(1);
    });

    it('should return undefined when no video frame can be read', async () => {
        const source = join(sources, 'clip.mov');
        await writeFile(source, 'x');
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });

        expect(await pipeline.generate(source, 'file', 'asset-4', SIZE)).toBeUndefined();
    });

    it('should share one rendered icon between folders', async () => {
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });

        const first = await pipeline.generate(join(sources, 'pack-a'), 'directory', 'asset-5', SIZE);
        const second = await pipeline.generate(join(sources, 'pack-b'), 'directory', 'asset-6', SIZE);

        expect(first).toBe('.asset_db/thumbnails/icons/folder_64x64.png');
        expect(second).toBe(first);
        const meta = await sharp(paths.Resolve(first ?? '')).metadata();
        expect(meta.width).toBe(64);
        expect(meta.height).toBe(64);
    });

    it('should remove only the per-asset entry', async () => {
        const source = join(sources, 'wide.png');
        await writeFile(source, await solidPng(100, 100));
        const pipeline = new ThumbnailPipeline(paths, { frameExtractor: new StubFrames() });
        await pipeline.generate(source, 'file', 'asset-7', SIZE);
        const icon = await pipeline.generate(join(sources, 'notes.txt'), 'file', 'asset-8', SIZE);

        await pipeline.remove('asset-7');
        await pipeline.remove('asset-8');

        expect(await fs.pathExists(paths.Resolve(pipeline.pathFor('asset-7')))).toBe(false);
        expect(icon).toBe('.asset_db/thumbnails/icons/document_64x64.png');
        expect(await fs.pathExists(paths.Resolve(icon ?? ''))).toBe(true);
    });
});
