/**
 * JSON-file metadata store under `{root}/.asset_db/assets.json`.
 *
 * Writes go to a temporary sibling and replace the document with a rename, so a crash mid-write
 * leaves either the old or the new document. The previous document is copied into the backup
 * directory before it is replaced; only the newest `backupCount` copies are kept.
 */
import { readdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import fs from 'fs-extra';
import type { AssetStore, StoreSnapshot } from '../Domain/Repository.js';
import { CorruptStoreError, DescribeError, PersistenceError, SystemErrorCode } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { PathManager } from '../Services/PathManager.js';
import { FindDuplicateRecord, FromRecord, ToDocument, storeDocumentSchema } from './AssetRecord.js';

const BACKUP_PATTERN = /^assets_.+\.json$/;

export interface JsonAssetStoreOptions {
    /** Previous documents to keep (0 disables backups). Default 5. */
    backupCount?: number;
}

/** File-system friendly timestamp, e.g. `2024-05-01T10-20-30-123Z`. */
function FileStamp(date: Date = new Date()): string {
    return date.toISOString().replace(/[:.]/g, `-`);
}

export class JsonAssetStore implements AssetStore {
    private readonly _paths: PathManager;
    private readonly _backupCount: number;
    private _lastStamp = ``; // keeps backup names unique within one millisecond

    constructor(paths: PathManager, options: JsonAssetStoreOptions = {}) {
        this._paths = paths;
        this._backupCount = options.backupCount ?? 5;
    }

    /** Absolute path of the store document. */
    public get file(): string {
        return this._paths.StoreFile();
    }

    async load(): Promise<StoreSnapshot> {
        const file = this.file;
        let text: string;

        try {
            text = await readFile(file, `utf-8`);
        } catch(err) {
            if (SystemErrorCode(err) === `ENOENT`) {
                return { assets: [], categories: [] };
            }
            throw new PersistenceError(`Failed to read store '${file}': ${DescribeError(err)}`, { file }, err);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch(err) {
            throw new CorruptStoreError(`Store is not valid JSON: ${DescribeError(err)}`, { file }, err);
        }

        const { error, value } = storeDocumentSchema.validate(parsed, { abortEarly: false, convert: true });
        if (error) {
            throw new CorruptStoreError(`Store failed validation: ${error.message}`, { file }, error);
        }
        const duplicate = FindDuplicateRecord(value.assets);
        if (duplicate) {
            throw new CorruptStoreError(`Store contains a ${duplicate}`, { file });
        }
        log.debug(`Loaded ${value.assets.length} asset(s) from ${file}`, `JsonAssetStore`);
        return {
            assets: value.assets.map(FromRecord),
            categories: value.categories,
        };
    }

    async save(snapshot: StoreSnapshot): Promise<void> {
        const file = this.file;
        const temp = `${file}.tmp`;
        const text = `${JSON.stringify(ToDocument(snapshot), null, 2)}\n`;

        try {
            await writeFile(temp, text, `utf-8`);
            await this._backup();
            await rename(temp, file);
        } catch(err) {
            await fs.remove(temp);
            throw new PersistenceError(`Failed to save store '${file}': ${DescribeError(err)}`, { file }, err);
        }
    }

    async quarantine(): Promise<string | undefined> {
        const file = this.file;

        if (!(await fs.pathExists(file))) {
            return undefined;
        }
        const target = join(this._paths.StoreDir(), `assets.corrupt-${FileStamp()}.json`);
        await rename(file, target);
        log.warning(`Unreadable store moved to ${target}`, `JsonAssetStore`);
        return target;
    }

    /** Backups currently on disk, oldest first. */
    async listBackups(): Promise<string[]> {
        const dir = this._paths.BackupDir();
        const names = (await readdir(dir)).filter(name => {
            return BACKUP_PATTERN.test(name);
        });
        return names.sort().map(name => {
            return join(dir, name);
        });
    }

    /** Copies the current document into the backup directory and prunes old copies. */
    private async _backup(): Promise<void> {
        if (this._backupCount <= 0 || !(await fs.pathExists(this.file))) {
            return;
        }
        let stamp = FileStamp();
        if (stamp <= this._lastStamp) {
            stamp = `${this._lastStamp}-1`;
        }
        this._lastStamp = stamp;
        await fs.copy(this.file, join(this._paths.BackupDir(), `assets_${stamp}.json`));

        const backups = await this.listBackups();
        for (const stale of backups.slice(0, Math.max(0, backups.length - this._backupCount))) {
            await fs.remove(stale);
        }
    }
}
