/**
 * Asset model for the library core.
 * An Asset is the in-memory form of one record in the metadata store.
 */

/** Closed set of asset kinds. Fixed at creation, never mutated. */
export const ASSET_KINDS = [`file`, `directory`] as const;

/** Asset kind discriminator; branch on it with an exhaustive switch. */
export type AssetKind = (typeof ASSET_KINDS)[number];

/**
 * One managed asset.
 * Paths are relative to the library root and use forward slashes.
 */
export interface Asset {
    /** Opaque unique identifier, never reused. */
    id: string; // uuid v4
    /** Display name, never empty. */
    name: string;
    /** Existing category name or the reserved default. */
    category: string;
    kind: AssetKind;
    /** Content location inside the library tree, e.g. `Textures/rock.png`. */
    libraryPath: string;
    /** Cached preview location, absent when not generated or generation failed. */
    thumbnailPath?: string;
    description: string;
    /** Case-sensitively unique; order carries no meaning. */
    tags: string[];
    /** Content size at import time (sum of file sizes for directories). */
    sizeBytes: number;
    /** Lower-case extension including the dot (`.png`), empty for directories. */
    fileExtension: string;
    createdAt: Date;
    updatedAt: Date;
}

/** Deep copy so callers never hold references into the registry. */
export function CloneAsset(asset: Asset): Asset {
    return {
        ...asset,
        tags: [...asset.tags],
        createdAt: new Date(asset.createdAt.getTime()),
        updatedAt: new Date(asset.updatedAt.getTime()),
    };
}

/**
 * Trims tags and removes case-sensitive duplicates, keeping first occurrences.
 * @example
 * NormalizeTags([' rock', 'Rock', 'rock']); // ['rock', 'Rock']
 */
export function NormalizeTags(tags: readonly string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];

    for (const tag of tags) {
        const trimmed = tag.trim();

        if (trimmed.length === 0 || seen.has(trimmed)) {
            continue;
        }
        seen.add(trimmed);
        out.push(trimmed);
    }
    return out;
}
