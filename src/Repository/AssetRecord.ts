/**
 * On-disk shape of the metadata store document and its mapping to the domain model.
 */
import { posix, win32 } from 'path';
import Joi from 'joi';
import { ASSET_KINDS } from '../Domain/Asset.js';
import type { Asset, AssetKind } from '../Domain/Asset.js';
import { ValidateCategoryName } from '../Domain/Category.js';
import type { StoreSnapshot } from '../Domain/Repository.js';
import { DescribeError } from '../Common/Errors.js';

/** Document format written by this version. */
export const STORE_VERSION = `2.0.0`;

/** One persisted asset (snake_case keys, ISO-8601 timestamps). */
export interface AssetRecord {
    id: string;
    name: string;
    category: string;
    asset_type: AssetKind;
    library_path: string; // root-relative, forward slashes
    thumbnail_path: string | null;
    description: string;
    tags: string[];
    size: number; // bytes
    file_extension: string;
    created_at: string;
    updated_at: string;
}

/** The whole store file. */
export interface StoreDocument {
    _version: string;
    assets: AssetRecord[];
    categories: string[];
}

/** True for a non-empty relative path that stays inside the root. */
export function IsSafeRelativePath(value: string): boolean {
    if (value.length === 0 || posix.isAbsolute(value) || win32.isAbsolute(value)) {
        return false;
    }
    return !value.split(/[\\/]/).some(segment => {
        return segment === `..`;
    });
}

const relativePathSchema = Joi.string().custom((value: string, helpers) => {
    return IsSafeRelativePath(value) ? value : helpers.error(`any.invalid`);
});

// stored names become folder names, so they obey the same rules as new categories
const categorySchema = Joi.string().custom((value: string, helpers) => {
    try {
        return ValidateCategoryName(value) === value ? value : helpers.error(`any.invalid`);
    } catch(err) {
        return helpers.message({ custom: `{{#label}} is not a valid category name: ${DescribeError(err)}` });
    }
});

const recordSchema = Joi.object<AssetRecord>({
    id: Joi.string().min(1).required(),
    name: Joi.string().min(1).required(),
    category: categorySchema.required(),
    asset_type: Joi.string().valid(...ASSET_KINDS).required(),
    library_path: relativePathSchema.required(),
    thumbnail_path: relativePathSchema.allow(null).default(null),
    description: Joi.string().allow(``).default(``),
    tags: Joi.array().items(Joi.string().min(1)).default([]),
    size: Joi.number().integer().min(0).required(),
    file_extension: Joi.string().allow(``).default(``),
    created_at: Joi.string().isoDate().required(),
    updated_at: Joi.string().isoDate().required(),
});

/** Validation applied to every document read from disk. Unknown top-level keys are tolerated. */
export const storeDocumentSchema = Joi.object<StoreDocument>({
    _version: Joi.string().default(STORE_VERSION),
    assets: Joi.array().items(recordSchema).default([]),
    categories: Joi.array().items(categorySchema).unique().default([]),
})
    .unknown(true)
    .required();

/** Domain asset to persisted record. */
export function ToRecord(asset: Asset): AssetRecord {
    return {
        id: asset.id,
        name: asset.name,
        category: asset.category,
        asset_type: asset.kind,
        library_path: asset.libraryPath,
        thumbnail_path: asset.thumbnailPath ?? null,
        description: asset.description,
        tags: [...asset.tags],
        size: asset.sizeBytes,
        file_extension: asset.fileExtension,
        created_at: asset.createdAt.toISOString(),
        updated_at: asset.updatedAt.toISOString(),
    };
}

/** Persisted record to domain asset. Expects a record that passed `storeDocumentSchema`. */
export function FromRecord(record: AssetRecord): Asset {
    const asset: Asset = {
        id: record.id,
        name: record.name,
        category: record.category,
        kind: record.asset_type,
        libraryPath: record.library_path,
        description: record.description,
        tags: [...record.tags],
        sizeBytes: record.size,
        fileExtension: record.file_extension,
        createdAt: new Date(record.created_at),
        updatedAt: new Date(record.updated_at),
    };

    if (record.thumbnail_path !== null) {
        asset.thumbnailPath = record.thumbnail_path;
    }
    return asset;
}

export function ToDocument(snapshot: StoreSnapshot): StoreDocument {
    return {
        _version: STORE_VERSION,
        assets: snapshot.assets.map(ToRecord),
        categories: [...snapshot.categories],
    };
}

/**
 * Finds the first id or library path used by more than one record.
 * @returns string | undefined - Description of the clash, if any
 */
export function FindDuplicateRecord(records: readonly AssetRecord[]): string | undefined {
    const ids = new Set<string>();
    const paths = new Set<string>();

    for (const record of records) {
        if (ids.has(record.id)) {
            return `duplicate asset id '${record.id}'`;
        }
        if (paths.has(record.library_path)) {
            return `duplicate library path '${record.library_path}'`;
        }
        ids.add(record.id);
        paths.add(record.library_path);
    }
    return undefined;
}
