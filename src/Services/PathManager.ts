import { existsSync, mkdirSync } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { ValidationError } from '../Common/Errors.js';

/** Reserved directory under the library root holding the store and caches. */
export const STORE_DIR_NAME = `.asset_db`;
/** Store document file name inside STORE_DIR_NAME. */
export const STORE_FILE_NAME = `assets.json`;

/**
 * PathManager centralizes resolution of filesystem paths inside one library root
 * (store file, backups, thumbnail cache, documents, category folders).
 * Directories are created on demand (idempotent); stored paths are root-relative with forward slashes.
 */
export class PathManager {
    private _root: string; // absolute library root
    private _ensured: Set<string> = new Set(); // memo of created directories

    /**
     * @param libraryRoot string - Absolute library root
     * @throws ValidationError if the root is not absolute
     */
    constructor(libraryRoot: string) {
        if (!isAbsolute(libraryRoot)) {
            throw new ValidationError(`Library root must be an absolute path`, { libraryRoot });
        }
        this._root = resolve(libraryRoot);
    }

    /** Ensure directory exists (mkdir -p semantics). */
    private __ensure(dir: string): string {
        if (!this._ensured.has(dir)) {
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
            }
            this._ensured.add(dir);
        }
        return dir;
    }

    /** Library root (created if missing). */
    public LibraryRoot(): string {
        return this.__ensure(this._root);
    }
    /** Reserved metadata directory. */
    public StoreDir(): string {
        return this.__ensure(join(this.LibraryRoot(), STORE_DIR_NAME));
    }
    /** Metadata store document. */
    public StoreFile(): string {
        return join(this.StoreDir(), STORE_FILE_NAME);
    }
    /** Previous store documents. */
    public BackupDir(): string {
        return this.__ensure(join(this.StoreDir(), `backup`));
    }
    /** Per-asset preview cache. */
    public ThumbnailsDir(): string {
        return this.__ensure(join(this.StoreDir(), `thumbnails`));
    }
    /** Rendered shared type icons. */
    public IconsDir(): string {
        return this.__ensure(join(this.ThumbnailsDir(), `icons`));
    }
    /** Per-asset info sheets. */
    public DocumentsDir(): string {
        return this.__ensure(join(this.StoreDir(), `documents`));
    }
    /** Staging area for content being deleted. */
    public TrashDir(): string {
        return this.__ensure(join(this.StoreDir(), `trash`));
    }
    /**
     * Folder holding a category's content (created if missing).
     * Not memoized: category folders may be deleted from outside.
     */
    public CategoryDir(category: string): string {
        const dir = this.CategoryPath(category);
        mkdirSync(dir, { recursive: true });
        return dir;
    }

    /**
     * Location of a category folder, without touching disk.
     * @throws ValidationError if the name would place it outside the library root
     */
    public CategoryPath(category: string): string {
        const dir = resolve(this.LibraryRoot(), category);

        if (dir === this._root || !dir.startsWith(this._root + sep)) {
            throw new ValidationError(`Category folder escapes the library root`, { category });
        }
        return dir;
    }

    /**
     * Converts a root-relative library path to an absolute one.
     * @throws ValidationError if the path is absolute or escapes the root
     */
    public Resolve(libraryPath: string): string {
        if (isAbsolute(libraryPath)) {
            throw new ValidationError(`Library paths must be relative to the library root`, { libraryPath });
        }
        const absolute = resolve(this._root, ...libraryPath.split(`/`));

        if (absolute !== this._root && !absolute.startsWith(this._root + sep)) {
            throw new ValidationError(`Library path escapes the library root`, { libraryPath });
        }
        return absolute;
    }

    /** Converts an absolute path inside the root to its stored form. */
    public Relative(absolutePath: string): string {
        return relative(this._root, absolutePath).split(sep).join(`/`);
    }

    /** True when `absolutePath` is the root or lies beneath it. */
    public Contains(absolutePath: string): boolean {
        const candidate = resolve(absolutePath);
        return candidate === this._root || candidate.startsWith(this._root + sep);
    }
}
