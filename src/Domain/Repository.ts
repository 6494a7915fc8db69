/**
 * Contracts for the persistence and preview collaborators of the asset manager.
 */
import type { Asset, AssetKind } from './Asset.js';

/** Full state persisted as one document. */
export interface StoreSnapshot {
    assets: Asset[]; // in insertion order
    categories: string[]; // unique, in creation order
}

/** Durable snapshot persistence for assets and categories. */
export interface AssetStore {
    /**
     * Reads the persisted snapshot. A store that was never written yields an empty snapshot.
     * @throws CorruptStoreError when the document cannot be parsed or validated
     */
    load(): Promise<StoreSnapshot>;
    /**
     * Replaces the persisted snapshot atomically.
     * @throws PersistenceError on unwritable media
     */
    save(snapshot: StoreSnapshot): Promise<void>;
    /**
     * Moves an unreadable store aside so the next save starts clean.
     * @returns string | undefined - Where the document was moved, if anything was moved
     */
    quarantine(): Promise<string | undefined>;
}

/** Thumbnail target dimensions in pixels. */
export interface ThumbnailSize {
    width: number;
    height: number;
}

/** Best-effort preview generation keyed by asset id. */
export interface ThumbnailGenerator {
    /**
     * Produces a preview for the content at `sourcePath`.
     * Never throws; failures yield `undefined`.
     * @returns string | undefined - Thumbnail location relative to the library root
     */
    generate(sourcePath: string, kind: AssetKind, assetId: string, targetSize: ThumbnailSize): Promise<string | undefined>;
    /** Deletes the per-asset cache entry, if any. Shared type icons are left in place. */
    remove(assetId: string): Promise<void>;
    /** Relative location of the per-asset cache entry (whether or not it exists). */
    pathFor(assetId: string): string;
}
