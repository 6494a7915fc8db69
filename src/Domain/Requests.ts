/**
 * Validated request structures accepted by the asset manager.
 * Only the enumerated fields are recognized; anything else is rejected.
 */
import Joi from 'joi';
import { ASSET_KINDS, NormalizeTags } from './Asset.js';
import type { AssetKind } from './Asset.js';
import { ValidationError } from '../Common/Errors.js';

/** Input for importing a file or folder into the library. */
export interface AddAssetRequest {
    sourcePath: string; // file or folder to import
    name?: string; // defaults to the source basename
    category?: string; // defaults to the reserved default category
    kind?: AssetKind; // must agree with what is found on disk
    description?: string;
    tags?: string[];
    createDocument?: boolean; // write an info sheet under .asset_db/documents
}

/** Partial update; only provided fields are applied. */
export interface AssetPatch {
    name?: string;
    category?: string;
    description?: string;
    tags?: string[];
}

/** One step of an import, reported to `onProgress` and the `import:progress` event. */
export interface ImportProgress {
    sourcePath: string;
    current: number; // files handled so far
    total: number; // files to handle
    message: string;
}

/** Per-call controls for `addAsset`. */
export interface AddAssetOptions {
    /** Aborting cancels between per-file steps; nothing is left behind. */
    signal?: AbortSignal;
    onProgress?: (progress: ImportProgress) => void;
}

const tagsSchema = Joi.array().items(Joi.string().trim().min(1));

const addAssetSchema = Joi.object<AddAssetRequest>({
    sourcePath: Joi.string().trim().min(1).required(),
    name: Joi.string().trim().min(1),
    category: Joi.string().trim().min(1),
    kind: Joi.string().valid(...ASSET_KINDS),
    description: Joi.string().allow(``),
    tags: tagsSchema,
    createDocument: Joi.boolean(),
}).required();

const patchSchema = Joi.object<AssetPatch>({
    name: Joi.string().trim().min(1),
    category: Joi.string().trim().min(1),
    description: Joi.string().allow(``),
    tags: tagsSchema,
});

function validate<T>(schema: Joi.ObjectSchema<T>, raw: unknown, what: string): T {
    const { error, value } = schema.validate(raw, { abortEarly: false, convert: true });

    if (error) {
        throw new ValidationError(`Invalid ${what}: ${error.message}`, {
            fields: error.details.map(detail => {
                return detail.path.join(`.`);
            }),
        });
    }
    return value;
}

/**
 * Validates and normalizes an import request.
 * @param raw unknown - Caller supplied request object
 * @returns AddAssetRequest - Trimmed request with deduplicated tags
 * @throws ValidationError on missing/empty fields, wrong types or unknown fields
 */
export function ParseAddAssetRequest(raw: unknown): AddAssetRequest {
    const request = validate(addAssetSchema, raw, `asset request`);

    if (request.tags) {
        request.tags = NormalizeTags(request.tags);
    }
    return request;
}

/**
 * Validates and normalizes an update patch.
 * @throws ValidationError on empty name/category, wrong types or unknown fields
 */
export function ParseAssetPatch(raw: unknown): AssetPatch {
    const patch = validate(patchSchema, raw ?? {}, `asset patch`);

    if (patch.tags) {
        patch.tags = NormalizeTags(patch.tags);
    }
    return patch;
}
