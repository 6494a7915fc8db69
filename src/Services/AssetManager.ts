/**
 * AssetManager orchestrates every state change of an asset library.
 *
 * It is the only component that spans the metadata store, the thumbnail pipeline and the registry.
 * Each mutating operation either completes (content in place, registry updated, snapshot saved)
 * or leaves the library as it found it. Callers serialize mutations; there is no internal locking.
 */
import { randomUUID } from 'crypto';
import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { basename, extname, isAbsolute, resolve } from 'path';
import type { Asset, AssetKind } from '../Domain/Asset.js';
import { ValidateCategoryName } from '../Domain/Category.js';
import type { AssetStore, StoreSnapshot, ThumbnailGenerator } from '../Domain/Repository.js';
import { ParseAddAssetRequest, ParseAssetPatch } from '../Domain/Requests.js';
import type { AddAssetOptions, AddAssetRequest, AssetPatch, ImportProgress } from '../Domain/Requests.js';
import {
    AppError,
    ConfigurationError,
    CorruptStoreError,
    DescribeError,
    DuplicateError,
    ImportError,
    LibraryPathConflictError,
    NotFoundError,
    PersistenceError,
    ProtectedCategoryError,
    SystemErrorCode,
    ValidationError,
} from '../Common/Errors.js';
import { DescribeAsset, FormatSize } from '../Common/Format.js';
import { log } from '../Common/Log.js';
import { AssetEventBus } from '../Events/AssetEventBus.js';
import { JsonAssetStore } from '../Repository/JsonAssetStore.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { AssetDocumentWriter } from './AssetDocumentWriter.js';
import { AssetRegistry } from './AssetRegistry.js';
import { SortAssets } from './AssetSorter.js';
import type { SortMethod } from './AssetSorter.js';
import type { ConfigService } from './ConfigService.js';
import { LibraryFiles } from './LibraryFiles.js';
import { MetricsService } from './MetricsService.js';
import { PathManager } from './PathManager.js';
import { IMAGE_EXTENSIONS, ThumbnailPipeline } from './ThumbnailPipeline.js';

/** Store and preview collaborators bound to one library root. */
export interface LibraryServices {
    store: AssetStore;
    thumbnails: ThumbnailGenerator;
}

/** Builds the collaborators for a library root; called again whenever the root changes. */
export type LibraryServicesFactory = (paths: PathManager, config: ValidatedConfig, metrics: MetricsService) => LibraryServices;

export interface AssetManagerOptions {
    config: ValidatedConfig;
    eventBus?: AssetEventBus;
    metrics?: MetricsService;
    /** When given, library root changes are written back to the configuration file. */
    configService?: ConfigService;
    services?: LibraryServicesFactory;
    clock?: () => Date;
    idFactory?: () => string;
}

/** Outcome of `rescanLibrary()`. */
export interface RescanReport {
    added: Asset[]; // untracked content that was registered
    missing: string[]; // ids whose content is no longer on disk
    repairedThumbnails: string[]; // ids whose thumbnail reference changed
}

interface OpenLibrary extends LibraryServices {
    paths: PathManager;
    files: LibraryFiles;
    documents: AssetDocumentWriter;
}

export const DefaultLibraryServices: LibraryServicesFactory = (paths, config, metrics) => {
    return {
        store: new JsonAssetStore(paths, { backupCount: config.storeBackupCount }),
        thumbnails: new ThumbnailPipeline(paths, { metrics }),
    };
};

export class AssetManager {
    private _config: ValidatedConfig;
    private readonly _bus: AssetEventBus;
    private readonly _metrics: MetricsService;
    private readonly _configService?: ConfigService;
    private readonly _services: LibraryServicesFactory;
    private readonly _clock: () => Date;
    private readonly _idFactory: () => string;
    private readonly _defaultCategory: string;
    private readonly _registry = new AssetRegistry();
    private readonly _issuedIds = new Set<string>(); // ids handed out this session
    private _categories: string[];
    private _library?: OpenLibrary;
    private _closed = false;

    /**
     * Prefer `AssetManager.Open`, which also loads the library.
     * @throws ConfigurationError if the default category is not a valid folder name
     */
    constructor(options: AssetManagerOptions) {
        this._config = options.config;
        this._metrics = options.metrics ?? new MetricsService();
        this._bus = options.eventBus ?? new AssetEventBus(this._metrics);
        this._configService = options.configService;
        this._services = options.services ?? DefaultLibraryServices;
        this._clock = options.clock ?? (() => {
            return new Date();
        });
        this._idFactory = options.idFactory ?? randomUUID;
        try {
            this._defaultCategory = ValidateCategoryName(options.config.defaultCategory);
        } catch(err) {
            throw new ConfigurationError(`Invalid default category: ${DescribeError(err)}`, { defaultCategory: options.config.defaultCategory }, err);
        }
        this._categories = [this._defaultCategory];
    }

    /**
     * Constructs a manager and loads the configured library, if any.
     * @example
     * const manager = await AssetManager.Open({ config });
     * await manager.addAsset({ sourcePath: '/imports/rock.png', tags: ['stone'] });
     */
    public static async Open(options: AssetManagerOptions): Promise<AssetManager> {
        const manager = new AssetManager(options);
        await manager.load();
        return manager;
    }

    public get events(): AssetEventBus {
        return this._bus;
    }

    public get metrics(): MetricsService {
        return this._metrics;
    }

    public get defaultCategory(): string {
        return this._defaultCategory;
    }

    /**
     * (Re)reads the store of the configured library into the registry.
     * An unreadable store is moved aside and the session starts empty.
     */
    public async load(): Promise<void> {
        this._assertOpen();
        const root = this._config.libraryPath;

        if (!root) {
            log.info(`No asset library configured yet`, `AssetManager`);
            this._library = undefined;
            this._registry.rebuild([]);
            this._categories = [this._defaultCategory];
            return;
        }
        const { library, snapshot } = await this._openLibrary(root);
        this._commitLibrary(library, snapshot);
    }

    /** Detaches all listeners; every later call fails with ConfigurationError. */
    public close(): void {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this._bus.removeAllListeners();
        log.info(`Asset manager closed`, `AssetManager`);
    }

    // ---------------------------------------------------------------- assets

    /**
     * Imports a file or folder into `{root}/{category}/{name}` and records it.
     * Thumbnail and info sheet are best-effort. On failure or cancellation nothing is left behind.
     * @throws ValidationError | ImportError | ImportCancelledError | PersistenceError | ConfigurationError
     */
    public async addAsset(request: AddAssetRequest, options: AddAssetOptions = {}): Promise<Asset> {
        this._assertOpen();
        try {
            const asset = await this._addAsset(request, options);
            this._metrics.Inc(`importsCompleted`);
            return asset;
        } catch(err) {
            this._metrics.Inc(`importsFailed`);
            throw err;
        }
    }

    /**
     * Deletes the asset's content, thumbnail and info sheet, then its record.
     * @throws NotFoundError | PersistenceError
     */
    public async removeAsset(id: string): Promise<void> {
        const library = this._requireLibrary();
        const asset = this._registry.getById(id);
        const before = this._registry.all();
        const staged = await library.files.Trash(asset.libraryPath, id);

        this._registry.remove(id);
        try {
            await this._persist(library);
        } catch(err) {
            this._registry.rebuild(before);
            if (staged) {
                await this._attempt(`restore content of ${asset.libraryPath}`, () => {
                    return library.files.Restore(staged, asset.libraryPath);
                });
            }
            throw err;
        }

        if (staged) {
            await this._attempt(`purge deleted content ${staged}`, () => {
                return library.files.Purge(staged);
            });
        } else {
            log.warning(`Content of ${asset.libraryPath} was already missing`, `AssetManager`, id);
        }
        await this._attempt(`remove thumbnail of ${id}`, () => {
            return library.thumbnails.remove(id);
        });
        await library.documents.remove(id);
        this._issuedIds.add(id);
        this._bus.Emit(`asset:removed`, { id, name: asset.name });
        log.info(`Removed asset '${asset.name}'`, `AssetManager`, id);
    }

    /**
     * Applies the provided fields. A category change moves the content to the new category folder.
     * @throws NotFoundError | ValidationError | PersistenceError
     */
    public async updateAsset(id: string, patch: AssetPatch): Promise<Asset> {
        this._assertOpen();
        const before = this._registry.getById(id);
        const changes = ParseAssetPatch(patch);

        if (Object.keys(changes).length === 0) {
            return before;
        }
        const library = this._requireLibrary();
        const category = changes.category === undefined ? before.category : this._resolveCategory(changes.category);
        const next: Asset = {
            ...before,
            name: changes.name ?? before.name,
            category,
            description: changes.description ?? before.description,
            tags: changes.tags ?? before.tags,
            updatedAt: this._tick(before.updatedAt),
        };

        if (category !== before.category) {
            next.libraryPath = await library.files.Relocate(before.libraryPath, category, before.kind, id, path => {
                return this._registry.isPathTaken(path);
            });
        }
        this._registry.replace(id, next);
        try {
            await this._persist(library);
        } catch(err) {
            this._registry.replace(id, before);
            await this._moveBack(library, next.libraryPath, before.libraryPath);
            throw err;
        }
        const after = this._registry.getById(id);
        this._bus.Emit(`asset:updated`, { before, after });
        log.info(`Updated asset '${after.name}'`, `AssetManager`, id);
        return after;
    }

    /** @throws NotFoundError */
    public getAsset(id: string): Asset {
        this._assertOpen();
        return this._registry.getById(id);
    }

    /** All assets in insertion order, optionally limited to one category. */
    public getAllAssets(category?: string): Asset[] {
        this._assertOpen();
        return category === undefined ? this._registry.all() : this._registry.filterByCategory(category);
    }

    public getAllAssetNames(): string[] {
        this._assertOpen();
        return this._registry.all().map(asset => {
            return asset.name;
        });
    }

    /** Case-insensitive match on name, description or tags; a blank keyword returns everything. */
    public searchAssets(keyword: string, category?: string): Asset[] {
        this._assertOpen();
        return this._registry.search(keyword, category);
    }

    public filterByCategory(category: string): Asset[] {
        this._assertOpen();
        return this._registry.filterByCategory(category);
    }

    public sortAssets(assets: readonly Asset[], method: SortMethod): Asset[] {
        return SortAssets(assets, method);
    }

    public formatSize(bytes: number): string {
        return FormatSize(bytes);
    }

    public describeAsset(asset: Asset): string {
        return DescribeAsset(asset);
    }

    /**
     * Re-runs the pipeline on the asset's library content.
     * @returns Asset - Updated asset; `thumbnailPath` is absent if generation failed
     */
    public async regenerateThumbnail(id: string): Promise<Asset> {
        const library = this._requireLibrary();
        const asset = this._registry.getById(id);
        const thumbnailPath = await library.thumbnails.generate(library.paths.Resolve(asset.libraryPath), asset.kind, id, this._config.thumbnailSize);

        return this._applyThumbnail(library, asset, thumbnailPath);
    }

    /**
     * Uses any image file as the asset's preview.
     * @throws ValidationError if the file is missing or not a decodable image
     */
    public async setCustomThumbnail(id: string, imagePath: string): Promise<Asset> {
        const library = this._requireLibrary();
        const asset = this._registry.getById(id);
        const source = resolve(imagePath);

        if (!IMAGE_EXTENSIONS.has(extname(source).toLowerCase())) {
            throw new ValidationError(`Not a supported image type: ${imagePath}`, { imagePath });
        }
        if (!(await AssetManager._isReadable(source))) {
            throw new ValidationError(`Image not found or unreadable: ${imagePath}`, { imagePath });
        }
        const thumbnailPath = await library.thumbnails.generate(source, `file`, id, this._config.thumbnailSize);
        if (thumbnailPath === undefined) {
            throw new ValidationError(`Image could not be decoded: ${imagePath}`, { imagePath });
        }
        return this._applyThumbnail(library, asset, thumbnailPath);
    }

    /**
     * Recomputes the size from the library content and refreshes the thumbnail.
     * @throws NotFoundError | ImportError (content missing) | PersistenceError
     */
    public async reimportAsset(id: string): Promise<Asset> {
        const library = this._requireLibrary();
        const before = this._registry.getById(id);
        const content = library.paths.Resolve(before.libraryPath);
        let sizeBytes: number;

        try {
            sizeBytes = await LibraryFiles.MeasureSize(content);
        } catch(err) {
            throw new ImportError(`Content of '${before.name}' cannot be read: ${DescribeError(err)}`, { id, libraryPath: before.libraryPath }, err);
        }
        const next: Asset = { ...before, sizeBytes, updatedAt: this._tick(before.updatedAt) };
        delete next.thumbnailPath;
        if (this._config.autoGenerateThumbnail) {
            const thumbnailPath = await library.thumbnails.generate(content, before.kind, id, this._config.thumbnailSize);
            if (thumbnailPath !== undefined) {
                next.thumbnailPath = thumbnailPath;
            }
        } else if (before.thumbnailPath !== undefined) {
            next.thumbnailPath = before.thumbnailPath;
        }
        await this._replaceAndPersist(library, before, next);
        const after = this._registry.getById(id);
        this._bus.Emit(`asset:updated`, { before, after });
        if (this._config.autoGenerateThumbnail) {
            this._bus.Emit(`thumbnail:updated`, { id, thumbnailPath: after.thumbnailPath });
        }
        log.info(`Re-imported asset '${after.name}' (${FormatSize(sizeBytes)})`, `AssetManager`, id);
        return after;
    }

    /**
     * Registers untracked content found in category folders, reports records whose content is gone
     * and repairs thumbnail references. Records with missing content are kept.
     * All or nothing: on any failure the registry and the generated thumbnails are rolled back.
     * @throws PersistenceError
     */
    public async rescanLibrary(): Promise<RescanReport> {
        const library = this._requireLibrary();
        const before = this._registry.all();
        const report: RescanReport = { added: [], missing: [], repairedThumbnails: [] };

        try {
            await this._scan(library, before, report);
            if (report.added.length > 0 || report.repairedThumbnails.length > 0) {
                await this._persist(library);
            }
        } catch(err) {
            this._registry.rebuild(before);
            for (const asset of report.added) {
                await this._attempt(`remove thumbnail of ${asset.id}`, () => {
                    return library.thumbnails.remove(asset.id);
                });
            }
            if (err instanceof AppError) {
                throw err;
            }
            throw new PersistenceError(`Rescan of ${library.paths.LibraryRoot()} failed: ${DescribeError(err)}`, {}, err);
        }

        for (const asset of report.added) {
            this._bus.Emit(`asset:added`, asset);
        }
        for (const id of report.repairedThumbnails) {
            this._bus.Emit(`thumbnail:updated`, { id, thumbnailPath: this._registry.getById(id).thumbnailPath });
        }
        log.info(
            `Rescan finished: ${report.added.length} added, ${report.missing.length} missing, ${report.repairedThumbnails.length} thumbnail(s) repaired`,
            `AssetManager`,
        );
        return report;
    }

    // ------------------------------------------------------------ categories

    /** Category names, default first, then in creation order. */
    public getCategories(): string[] {
        this._assertOpen();
        return [...this._categories];
    }

    /**
     * Creates a category and its folder.
     * @throws ValidationError | DuplicateError | PersistenceError
     */
    public async addCategory(name: string): Promise<void> {
        const library = this._requireLibrary();
        const category = ValidateCategoryName(name);

        if (this._categories.includes(category)) {
            throw new DuplicateError(`Category already exists: ${category}`, { category });
        }
        library.paths.CategoryDir(category);
        this._categories.push(category);
        try {
            await this._persist(library);
        } catch(err) {
            this._categories = this._categories.filter(existing => {
                return existing !== category;
            });
            await this._attempt(`remove folder of category ${category}`, () => {
                return library.files.RemoveCategoryDirIfEmpty(category);
            });
            throw err;
        }
        this._bus.Emit(`category:added`, { name: category });
        log.info(`Added category '${category}'`, `AssetManager`);
    }

    /**
     * Deletes a category. Its assets are reassigned to the default category and their content
     * moves to the default folder; the category folder is deleted when left empty.
     * @throws ProtectedCategoryError | NotFoundError | PersistenceError
     */
    public async removeCategory(name: string): Promise<void> {
        this._assertOpen();
        if (name === this._defaultCategory) {
            throw new ProtectedCategoryError(`The default category cannot be removed`, { category: name });
        }
        if (!this._categories.includes(name)) {
            throw new NotFoundError(`Category not found: ${name}`, { category: name });
        }
        const library = this._requireLibrary();
        const before = this._registry.all();
        const categoriesBefore = [...this._categories];
        const moved: { from: string; to: string }[] = [];
        const reassigned: { before: Asset; after: Asset }[] = [];

        try {
            for (const member of this._registry.filterByCategory(name)) {
                const libraryPath = await library.files.Relocate(member.libraryPath, this._defaultCategory, member.kind, member.id, path => {
                    return this._registry.isPathTaken(path);
                });
                moved.push({ from: member.libraryPath, to: libraryPath });
                const next: Asset = { ...member, category: this._defaultCategory, libraryPath, updatedAt: this._tick(member.updatedAt) };
                this._registry.replace(member.id, next);
                reassigned.push({ before: member, after: next });
            }
            this._categories = this._categories.filter(existing => {
                return existing !== name;
            });
            await this._persist(library);
        } catch(err) {
            this._registry.rebuild(before);
            this._categories = categoriesBefore;
            for (const move of moved.reverse()) {
                await this._moveBack(library, move.to, move.from);
            }
            throw err;
        }

        await this._attempt(`remove folder of category ${name}`, () => {
            return library.files.RemoveCategoryDirIfEmpty(name);
        });
        for (const change of reassigned) {
            this._bus.Emit(`asset:updated`, { before: change.before, after: this._registry.getById(change.after.id) });
        }
        this._bus.Emit(`category:removed`, {
            name,
            reassigned: reassigned.map(change => {
                return change.after.id;
            }),
        });
        log.info(`Removed category '${name}', ${reassigned.length} asset(s) moved to '${this._defaultCategory}'`, `AssetManager`);
    }

    // ------------------------------------------------------------------ root

    public getLibraryPath(): string | undefined {
        this._assertOpen();
        return this._config.libraryPath;
    }

    /**
     * Points the manager at another library root and loads whatever store lives there.
     * Existing content is never migrated: the change is refused while the current library holds assets.
     * @throws ValidationError | LibraryPathConflictError | ConfigurationError | PersistenceError
     */
    public async setLibraryPath(path: string): Promise<void> {
        this._assertOpen();
        if (typeof path !== `string` || !isAbsolute(path)) {
            throw new ValidationError(`Library path must be an absolute path`, { path });
        }
        const next = resolve(path);
        const previous = this._config.libraryPath;

        if (previous !== undefined && resolve(previous) === next) {
            return;
        }
        if (this._registry.size > 0) {
            throw new LibraryPathConflictError(`The current library still holds ${this._registry.size} asset(s); remove them before changing the library root`, {
                current: previous,
                requested: next,
            });
        }
        const { library, snapshot } = await this._openLibrary(next);

        this._config = this._configService ? await this._configService.Save({ libraryPath: next }) : { ...this._config, libraryPath: next };
        this._commitLibrary(library, snapshot);
        this._bus.Emit(`library:changed`, { previous, current: next });
        log.info(`Library root set to ${next}`, `AssetManager`);
    }

    // --------------------------------------------------------------- private

    private async _addAsset(raw: unknown, options: AddAssetOptions): Promise<Asset> {
        const library = this._requireLibrary();
        const request = ParseAddAssetRequest(raw);
        const source = resolve(request.sourcePath);
        const kind = await this._inspectSource(source, library);

        if (request.kind !== undefined && request.kind !== kind) {
            throw new ValidationError(`Source is a ${kind}, not a ${request.kind}`, { sourcePath: source, kind: request.kind });
        }
        const category = request.category === undefined ? this._defaultCategory : this._resolveCategory(request.category);
        const mode = this._config.importMode;
        LibraryFiles.ThrowIfAborted(options.signal, source);

        let sizeBytes: number;
        try {
            sizeBytes = await LibraryFiles.MeasureSize(source);
        } catch(err) {
            throw new ImportError(`Source cannot be read: ${source}: ${DescribeError(err)}`, { sourcePath: source }, err);
        }
        if (mode === `copy`) {
            const free = await library.files.FreeBytes();
            if (sizeBytes > free) {
                throw new ImportError(`Insufficient space in the library for '${source}'`, { sourcePath: source, sizeBytes, free });
            }
        }

        const id = this._newId();
        const baseName = basename(source);
        const libraryPath = await library.files.ReserveTarget(category, baseName, kind, id, path => {
            return this._registry.isPathTaken(path);
        });
        const onProgress = (progress: ImportProgress): void => {
            options.onProgress?.(progress);
            this._bus.Emit(`import:progress`, progress);
        };
        await library.files.Import(source, libraryPath, kind, mode, { signal: options.signal, onProgress });

        let inserted = false;
        let asset: Asset;
        try {
            const thumbnailPath = this._config.autoGenerateThumbnail
                ? await library.thumbnails.generate(library.paths.Resolve(libraryPath), kind, id, this._config.thumbnailSize)
                : undefined;
            LibraryFiles.ThrowIfAborted(options.signal, source);

            const now = this._clock();
            asset = {
                id,
                name: request.name ?? baseName,
                category,
                kind,
                libraryPath,
                description: request.description ?? ``,
                tags: request.tags ?? [],
                sizeBytes,
                fileExtension: kind === `file` ? extname(baseName).toLowerCase() : ``,
                createdAt: now,
                updatedAt: now,
            };
            if (thumbnailPath !== undefined) {
                asset.thumbnailPath = thumbnailPath;
            }
            this._registry.insert(asset);
            inserted = true;
            await this._persist(library);
        } catch(err) {
            if (inserted) {
                this._registry.remove(id);
            }
            await this._attempt(`remove thumbnail of ${id}`, () => {
                return library.thumbnails.remove(id);
            });
            if (mode === `move`) {
                await this._attempt(`return ${libraryPath} to ${source}`, () => {
                    return library.files.Export(libraryPath, source);
                });
            } else {
                await this._attempt(`discard ${libraryPath}`, () => {
                    return library.files.Remove(libraryPath);
                });
            }
            if (err instanceof AppError) {
                throw err;
            }
            throw new ImportError(`Failed to add '${source}': ${DescribeError(err)}`, { sourcePath: source }, err);
        }

        if (request.createDocument) {
            await library.documents.write(asset);
        }
        this._bus.Emit(`asset:added`, this._registry.getById(id));
        log.info(`Added ${kind} '${asset.name}' to '${category}' (${FormatSize(sizeBytes)})`, `AssetManager`, id);
        return this._registry.getById(id);
    }

    /** Checks the source is readable and outside the library; returns what it is. */
    private async _inspectSource(source: string, library: OpenLibrary): Promise<AssetKind> {
        if (library.paths.Contains(source)) {
            throw new ValidationError(`Source is already inside the asset library: ${source}`, { sourcePath: source });
        }
        if (!(await AssetManager._isReadable(source))) {
            throw new ImportError(`Source not found or unreadable: ${source}`, { sourcePath: source });
        }
        const stats = await stat(source);

        if (stats.isDirectory()) {
            return `directory`;
        }
        if (stats.isFile()) {
            return `file`;
        }
        throw new ImportError(`Source is neither a file nor a folder: ${source}`, { sourcePath: source });
    }

    /** Fills `report` and applies its changes to the registry only. */
    private async _scan(library: OpenLibrary, before: Asset[], report: RescanReport): Promise<void> {
        for (const asset of before) {
            if (!(await library.files.Exists(asset.libraryPath))) {
                report.missing.push(asset.id);
                log.warning(`Content missing for '${asset.name}' at ${asset.libraryPath}`, `AssetManager`, asset.id);
            }
            const repaired = await this._repairThumbnail(library, asset);
            if (repaired) {
                this._registry.replace(asset.id, repaired);
                report.repairedThumbnails.push(asset.id);
            }
        }

        for (const category of this._categories) {
            for (const entry of await library.files.ListCategory(category)) {
                const libraryPath = `${category}/${entry.name}`;

                if (entry.name.startsWith(`.`) || this._registry.isPathTaken(libraryPath)) {
                    continue;
                }
                const kind: AssetKind | undefined = entry.isDirectory() ? `directory` : entry.isFile() ? `file` : undefined;
                if (!kind) {
                    continue;
                }
                const asset = await this._registerInPlace(library, libraryPath, entry.name, category, kind);
                report.added.push(asset);
                this._registry.insert(asset);
            }
        }
    }

    /** Registers content that already sits in a category folder. */
    private async _registerInPlace(library: OpenLibrary, libraryPath: string, entryName: string, category: string, kind: AssetKind): Promise<Asset> {
        const id = this._newId();
        const content = library.paths.Resolve(libraryPath);
        const extension = kind === `file` ? extname(entryName) : ``;
        const now = this._clock();
        const asset: Asset = {
            id,
            name: extension ? entryName.slice(0, -extension.length) : entryName,
            category,
            kind,
            libraryPath,
            description: ``,
            tags: [],
            sizeBytes: await LibraryFiles.MeasureSize(content),
            fileExtension: extension.toLowerCase(),
            createdAt: now,
            updatedAt: now,
        };

        if (this._config.autoGenerateThumbnail) {
            const thumbnailPath = await library.thumbnails.generate(content, kind, id, this._config.thumbnailSize);
            if (thumbnailPath !== undefined) {
                asset.thumbnailPath = thumbnailPath;
            }
        }
        log.info(`Registered untracked ${kind} ${libraryPath}`, `AssetManager`, id);
        return asset;
    }

    /**
     * A stale thumbnail reference falls back to the per-asset cache entry, or is cleared.
     * @returns Asset | undefined - Repaired asset, or undefined when nothing changed
     */
    private async _repairThumbnail(library: OpenLibrary, asset: Asset): Promise<Asset | undefined> {
        if (asset.thumbnailPath !== undefined && (await library.files.Exists(asset.thumbnailPath))) {
            return undefined;
        }
        const cached = library.thumbnails.pathFor(asset.id);
        const fallback = (await library.files.Exists(cached)) ? cached : undefined;

        if (fallback === asset.thumbnailPath) {
            return undefined;
        }
        const repaired: Asset = { ...asset, updatedAt: this._tick(asset.updatedAt) };
        delete repaired.thumbnailPath;
        if (fallback !== undefined) {
            repaired.thumbnailPath = fallback;
        }
        return repaired;
    }

    private async _applyThumbnail(library: OpenLibrary, before: Asset, thumbnailPath: string | undefined): Promise<Asset> {
        const next: Asset = { ...before, updatedAt: this._tick(before.updatedAt) };

        delete next.thumbnailPath;
        if (thumbnailPath !== undefined) {
            next.thumbnailPath = thumbnailPath;
        }
        await this._replaceAndPersist(library, before, next);
        this._bus.Emit(`thumbnail:updated`, { id: before.id, thumbnailPath });
        log.info(`Thumbnail of '${before.name}' ${thumbnailPath ? `set to ${thumbnailPath}` : `cleared`}`, `AssetManager`, before.id);
        return this._registry.getById(before.id);
    }

    private async _replaceAndPersist(library: OpenLibrary, before: Asset, next: Asset): Promise<void> {
        this._registry.replace(before.id, next);
        try {
            await this._persist(library);
        } catch(err) {
            this._registry.replace(before.id, before);
            throw err;
        }
    }

    private async _openLibrary(root: string): Promise<{ library: OpenLibrary; snapshot: StoreSnapshot }> {
        const paths = new PathManager(root);
        const services = this._services(paths, this._config, this._metrics);
        const library: OpenLibrary = {
            ...services,
            paths,
            files: new LibraryFiles(paths),
            documents: new AssetDocumentWriter(paths),
        };

        try {
            return { library, snapshot: await library.store.load() };
        } catch(err) {
            if (!(err instanceof CorruptStoreError)) {
                throw err;
            }
            const storeFile = paths.StoreFile();
            let quarantinedTo: string | undefined;
            try {
                quarantinedTo = await library.store.quarantine();
            } catch(quarantineErr) {
                log.error(`Could not move unreadable store aside: ${DescribeError(quarantineErr)}`, `AssetManager`);
            }
            log.error(`Asset store ${storeFile} is unreadable, starting empty: ${err.message}`, `AssetManager`);
            this._bus.Emit(`store:corrupt`, { storeFile, quarantinedTo, reason: err.message });
            return { library, snapshot: { assets: [], categories: [] } };
        }
    }

    private _commitLibrary(library: OpenLibrary, snapshot: StoreSnapshot): void {
        const categories = [this._defaultCategory];

        for (const category of snapshot.categories) {
            if (!categories.includes(category)) {
                categories.push(category);
            }
        }
        for (const asset of snapshot.assets) {
            if (!categories.includes(asset.category)) {
                log.warning(`Asset '${asset.name}' refers to unknown category '${asset.category}', restoring it`, `AssetManager`, asset.id);
                categories.push(asset.category);
            }
        }
        this._registry.rebuild(snapshot.assets);
        for (const asset of snapshot.assets) {
            this._issuedIds.add(asset.id);
        }
        this._categories = categories;
        this._library = library;
        const libraryRoot = library.paths.LibraryRoot();
        this._bus.Emit(`assets:loaded`, { count: this._registry.size, libraryRoot });
        log.info(`Loaded ${this._registry.size} asset(s) from ${libraryRoot}`, `AssetManager`);
    }

    private async _persist(library: OpenLibrary): Promise<void> {
        await library.store.save({ assets: this._registry.all(), categories: [...this._categories] });
        this._metrics.Inc(`storeSaves`);
    }

    /** Moves content back after a failed relocation, if it was moved. */
    private async _moveBack(library: OpenLibrary, from: string, to: string): Promise<void> {
        if (from === to || !(await library.files.Exists(from))) {
            return;
        }
        await this._attempt(`move ${from} back to ${to}`, () => {
            return library.files.MoveTo(from, to);
        });
    }

    /** Runs a cleanup step whose failure must not mask the error being handled. */
    private async _attempt(what: string, step: () => Promise<unknown>): Promise<void> {
        try {
            await step();
        } catch(err) {
            log.warning(`Could not ${what}: ${DescribeError(err)}`, `AssetManager`);
        }
    }

    private _resolveCategory(name: string): string {
        const category = name.trim();

        if (!this._categories.includes(category)) {
            throw new ValidationError(`Unknown category: ${category}`, { category });
        }
        return category;
    }

    private _newId(): string {
        let id = this._idFactory();
        while (this._issuedIds.has(id) || this._registry.has(id)) {
            id = this._idFactory();
        }
        this._issuedIds.add(id);
        return id;
    }

    /** Current time, strictly after `previous`. */
    private _tick(previous: Date): Date {
        const now = this._clock();
        return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
    }

    private _requireLibrary(): OpenLibrary {
        this._assertOpen();
        if (!this._library) {
            throw new ConfigurationError(`No asset library path is configured`);
        }
        return this._library;
    }

    private _assertOpen(): void {
        if (this._closed) {
            throw new ConfigurationError(`Asset manager has been closed`);
        }
    }

    private static async _isReadable(path: string): Promise<boolean> {
        try {
            await access(path, constants.R_OK);
            return true;
        } catch(err) {
            const code = SystemErrorCode(err);
            if (code === `ENOENT` || code === `EACCES` || code === `ENOTDIR` || code === `EPERM`) {
                return false;
            }
            throw err;
        }
    }
}
