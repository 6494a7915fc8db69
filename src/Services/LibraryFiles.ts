/**
 * Moves content into, around and out of the library tree.
 * Every operation either completes or leaves no partial content behind.
 */
import type { Dirent } from 'fs';
import { lstat, readdir, rename, rmdir, stat, statfs } from 'fs/promises';
import { basename, extname, join } from 'path';
import fs from 'fs-extra';
import type { AssetKind } from '../Domain/Asset.js';
import type { ImportProgress } from '../Domain/Requests.js';
import type { ImportMode } from '../Types/Config.js';
import { DescribeError, ImportCancelledError, ImportError, PersistenceError, SystemErrorCode } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { PathManager } from './PathManager.js';

/** Controls for a single import. */
export interface ImportControls {
    signal?: AbortSignal;
    onProgress?: (progress: ImportProgress) => void;
}

/** Decides whether a root-relative path is already claimed by a record. */
export type SlotTaken = (libraryPath: string) => boolean;

export class LibraryFiles {
    private readonly _paths: PathManager;

    constructor(paths: PathManager) {
        this._paths = paths;
    }

    /**
     * Size in bytes of a file, or the sum of all file sizes beneath a folder.
     * Symlinks are followed: an import stores what they point at.
     * @example
     * const bytes = await LibraryFiles.MeasureSize('/imports/rocks');
     */
    public static async MeasureSize(absolutePath: string): Promise<number> {
        const stats = await stat(absolutePath);

        if (stats.isFile()) {
            return stats.size;
        }
        if (!stats.isDirectory()) {
            return 0;
        }
        let total = 0;
        for (const entry of await readdir(absolutePath)) {
            total += await LibraryFiles.MeasureSize(join(absolutePath, entry));
        }
        return total;
    }

    /** Free bytes available to this process on the library volume. */
    public async FreeBytes(): Promise<number> {
        const stats = await statfs(this._paths.LibraryRoot());
        return stats.bavail * stats.bsize;
    }

    /** True when something exists at the root-relative path. */
    public async Exists(libraryPath: string): Promise<boolean> {
        return fs.pathExists(this._paths.Resolve(libraryPath));
    }

    /**
     * Picks a free slot `{category}/{name}` for new content. On collision the name gets a suffix
     * derived from the asset id: first its 8-character prefix, then the full id.
     * @returns string - Root-relative path that is neither on disk nor claimed by a record
     * @throws ImportError if every candidate is taken
     */
    public async ReserveTarget(category: string, baseName: string, kind: AssetKind, id: string, isTaken: SlotTaken): Promise<string> {
        this._paths.CategoryDir(category);
        const extension = kind === `file` ? extname(baseName) : ``;
        const stem = extension ? baseName.slice(0, -extension.length) : baseName;
        const candidates = [baseName, `${stem}_${id.slice(0, 8)}${extension}`, `${stem}_${id}${extension}`];

        for (const candidate of candidates) {
            const libraryPath = `${category}/${candidate}`;

            if (!isTaken(libraryPath) && !(await this.Exists(libraryPath))) {
                return libraryPath;
            }
        }
        throw new ImportError(`No free storage slot for '${baseName}' in category '${category}'`, { category, baseName });
    }

    /**
     * Brings source content to `libraryPath`. Copy mode works file by file and honours the abort
     * signal between files; move mode relocates the source in one step.
     * On any failure or cancellation the partially written target is removed before the error propagates.
     * @throws ImportCancelledError | ImportError
     */
    public async Import(sourcePath: string, libraryPath: string, kind: AssetKind, mode: ImportMode, controls: ImportControls = {}): Promise<void> {
        const target = this._paths.Resolve(libraryPath);
        const report = (current: number, total: number, message: string): void => {
            controls.onProgress?.({ sourcePath, current, total, message });
        };

        // a linked source is copied by value even in move mode; only the link leaves its folder
        const linked = await LibraryFiles._isSymlink(sourcePath);

        if (mode === `move` && !linked) {
            LibraryFiles.ThrowIfAborted(controls.signal, sourcePath);
            report(0, 1, `Moving ${basename(sourcePath)}`);
            try {
                await fs.move(sourcePath, target, { overwrite: false });
            } catch(err) {
                throw LibraryFiles._importFailure(err, sourcePath);
            }
            report(1, 1, `Moved ${basename(sourcePath)}`);
            return;
        }

        try {
            const units = kind === `directory` ? await LibraryFiles._listCopyUnits(sourcePath) : [``];
            const total = units.length;

            if (kind === `directory`) {
                await fs.ensureDir(target);
            }
            report(0, total, `Copying ${basename(sourcePath)}`);
            for (let i = 0; i < units.length; i++) {
                LibraryFiles.ThrowIfAborted(controls.signal, sourcePath);
                const unit = units[i];
                await fs.copy(join(sourcePath, unit), join(target, unit), {
                    overwrite: false,
                    errorOnExist: true,
                    preserveTimestamps: true,
                    dereference: true,
                });
                report(i + 1, total, unit || basename(sourcePath));
            }
            if (mode === `move`) {
                await fs.remove(sourcePath);
            }
        } catch(err) {
            await this._discard(target);
            if (err instanceof ImportError) {
                throw err;
            }
            throw LibraryFiles._importFailure(err, sourcePath);
        }
    }

    /**
     * Moves content between two root-relative paths.
     * @throws PersistenceError
     */
    public async MoveTo(fromPath: string, toPath: string): Promise<void> {
        try {
            await fs.move(this._paths.Resolve(fromPath), this._paths.Resolve(toPath), { overwrite: false });
        } catch(err) {
            throw new PersistenceError(`Failed to move '${fromPath}' to '${toPath}': ${DescribeError(err)}`, { fromPath, toPath }, err);
        }
    }

    /**
     * Moves content into another category folder, keeping its name when the slot is free.
     * Missing content is not an error: only the new path is computed.
     * @returns string - New root-relative path
     */
    public async Relocate(libraryPath: string, category: string, kind: AssetKind, id: string, isTaken: SlotTaken): Promise<string> {
        const name = libraryPath.split(`/`).pop() ?? libraryPath;
        const next = await this.ReserveTarget(category, name, kind, id, isTaken);

        if (await this.Exists(libraryPath)) {
            await this.MoveTo(libraryPath, next);
        } else {
            log.warning(`Content for '${libraryPath}' is missing; recording new location only`, `LibraryFiles`);
        }
        return next;
    }

    /**
     * Moves content back out of the library (rollback of a move-mode import).
     * @throws PersistenceError
     */
    public async Export(libraryPath: string, destination: string): Promise<void> {
        try {
            await fs.move(this._paths.Resolve(libraryPath), destination, { overwrite: false });
        } catch(err) {
            throw new PersistenceError(`Failed to move '${libraryPath}' back to '${destination}': ${DescribeError(err)}`, { libraryPath, destination }, err);
        }
    }

    /**
     * Stages content for deletion by renaming it into the trash directory.
     * @returns string | undefined - Trash location, or undefined when the content was already gone
     * @throws PersistenceError
     */
    public async Trash(libraryPath: string, id: string): Promise<string | undefined> {
        const source = this._paths.Resolve(libraryPath);

        if (!(await fs.pathExists(source))) {
            return undefined;
        }
        const staged = join(this._paths.TrashDir(), id);
        try {
            await fs.remove(staged);
            await rename(source, staged);
        } catch(err) {
            throw new PersistenceError(`Failed to delete '${libraryPath}': ${DescribeError(err)}`, { libraryPath }, err);
        }
        return staged;
    }

    /** Puts trashed content back where it was. */
    public async Restore(staged: string, libraryPath: string): Promise<void> {
        await rename(staged, this._paths.Resolve(libraryPath));
    }

    /** Permanently deletes trashed content. */
    public async Purge(staged: string): Promise<void> {
        await fs.remove(staged);
    }

    /** Permanently deletes content at a root-relative path. */
    public async Remove(libraryPath: string): Promise<void> {
        await fs.remove(this._paths.Resolve(libraryPath));
    }

    /**
     * Removes a category folder when it holds nothing.
     * @returns boolean - Whether the folder was removed
     */
    public async RemoveCategoryDirIfEmpty(category: string): Promise<boolean> {
        const dir = this._paths.CategoryPath(category);
        let entries: string[];
        try {
            entries = await readdir(dir);
        } catch(err) {
            if (SystemErrorCode(err) === `ENOENT`) {
                return false;
            }
            throw err;
        }

        if (entries.length > 0) {
            log.warning(`Category folder is not empty, keeping it: ${dir}`, `LibraryFiles`);
            return false;
        }
        await rmdir(dir);
        return true;
    }

    /** Entries of a category folder; a folder deleted from disk reads as empty. */
    public async ListCategory(category: string): Promise<Dirent[]> {
        try {
            return await readdir(this._paths.CategoryPath(category), { withFileTypes: true });
        } catch(err) {
            if (SystemErrorCode(err) === `ENOENT`) {
                return [];
            }
            throw err;
        }
    }

    /** Throws ImportCancelledError once the signal has fired. */
    public static ThrowIfAborted(signal: AbortSignal | undefined, sourcePath: string): void {
        if (signal?.aborted) {
            throw new ImportCancelledError(`Import of '${sourcePath}' was cancelled`, { sourcePath });
        }
    }

    /** Relative paths of every file, symlink and empty folder beneath `root`. */
    private static async _listCopyUnits(root: string, prefix = ``): Promise<string[]> {
        const entries = await readdir(join(root, prefix), { withFileTypes: true });
        const units: string[] = [];

        for (const entry of entries) {
            const unit = prefix ? join(prefix, entry.name) : entry.name;

            if (entry.isDirectory()) {
                const nested = await LibraryFiles._listCopyUnits(root, unit);
                units.push(...(nested.length > 0 ? nested : [unit]));
            } else {
                units.push(unit);
            }
        }
        return units;
    }

    private static async _isSymlink(path: string): Promise<boolean> {
        try {
            return (await lstat(path)).isSymbolicLink();
        } catch(err) {
            throw LibraryFiles._importFailure(err, path);
        }
    }

    private static _importFailure(err: unknown, sourcePath: string): ImportError {
        if (SystemErrorCode(err) === `ENOSPC`) {
            return new ImportError(`Insufficient space in the library for '${sourcePath}'`, { sourcePath }, err);
        }
        return new ImportError(`Failed to import '${sourcePath}': ${DescribeError(err)}`, { sourcePath }, err);
    }

    private async _discard(target: string): Promise<void> {
        try {
            await fs.remove(target);
        } catch(err) {
            log.warning(`Could not remove partial import at ${target}: ${DescribeError(err)}`, `LibraryFiles`);
        }
    }
}
