import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import fs from 'fs-extra';
import { OpenAssetLibrary } from '../src/Setup/AssetLibrary.js';
import { JsonAssetStore } from '../src/Repository/JsonAssetStore.js';
import { SetLogLevel } from '../src/Common/Log.js';
import { ConfigurationError } from '../src/Common/Errors.js';
import { MakeTempDir, StubThumbnails } from './helpers/TestLibrary.js';

describe('OpenAssetLibrary', () => {
    let dir: string;
    let root: string;
    const savedPath = process.env.ASSET_LIBRARY_PATH;

    beforeEach(async () => {
        delete process.env.ASSET_LIBRARY_PATH;
        dir = await MakeTempDir('asset-setup-');
        root = await MakeTempDir();
    });

    afterEach(async () => {
        SetLogLevel('debug');
        await fs.remove(dir);
        await fs.remove(root);
        if (savedPath !== undefined) {
            process.env.ASSET_LIBRARY_PATH = savedPath;
        }
    });

    it('should open the configured library and share one bus and metrics', async () => {
        const file = join(dir, 'config.json');
        await writeFile(file, JSON.stringify({ asset_library_path: root, default_category: 'General' }));

        const { manager, configService, metrics } = await OpenAssetLibrary(file, {
            services: paths => ({ store: new JsonAssetStore(paths), thumbnails: new StubThumbnails(paths) }),
        });

        expect(manager.getLibraryPath()).toBe(root);
        expect(manager.getCategories()).toEqual(['General']);
        expect(configService.Current().defaultCategory).toBe('General');
        expect(metrics.Snapshot().eventsPublished).toEqual({ 'config:loaded': 1, 'assets:loaded': 1 });
        manager.close();
    });

    it('should start without a library when none is configured', async () => {
        const { manager } = await OpenAssetLibrary(join(dir, 'missing.json'));

        expect(manager.getLibraryPath()).toBeUndefined();
        expect(manager.getAllAssets()).toEqual([]);
        manager.close();
    });

    it('should refuse an invalid configuration', async () => {
        const file = join(dir, 'config.json');
        await writeFile(file, JSON.stringify({ import_mode: 'link' }));

        await expect(OpenAssetLibrary(file)).rejects.toBeInstanceOf(ConfigurationError);
    });
});
