/**
 * In-memory index over the live asset collection.
 *
 * The registry is a derived view: it can always be rebuilt from the store snapshot.
 * Lookups by id and by library path are O(1); search and category filtering walk the collection
 * in insertion order, so results are deterministic. Every asset handed in or out is copied.
 */
import type { Asset } from '../Domain/Asset.js';
import { CloneAsset } from '../Domain/Asset.js';
import { DuplicateError, NotFoundError, ValidationError } from '../Common/Errors.js';

export class AssetRegistry {
    private _byId: Map<string, Asset> = new Map(); // insertion ordered
    private _byCategory: Map<string, Set<string>> = new Map(); // category -> ids
    private _byPath: Map<string, string> = new Map(); // libraryPath -> id

    /** Number of live assets. */
    public get size(): number {
        return this._byId.size;
    }

    /**
     * Replaces the entire index. On a clash the previous index is kept.
     * @throws DuplicateError if two assets share an id or a library path
     */
    public rebuild(assets: readonly Asset[]): void {
        const previous = { byId: this._byId, byCategory: this._byCategory, byPath: this._byPath };

        this._byId = new Map();
        this._byCategory = new Map();
        this._byPath = new Map();
        try {
            for (const asset of assets) {
                this.insert(asset);
            }
        } catch(err) {
            this._byId = previous.byId;
            this._byCategory = previous.byCategory;
            this._byPath = previous.byPath;
            throw err;
        }
    }

    /**
     * Adds an asset at the end of the collection.
     * @throws DuplicateError if the id or the library path is already indexed
     */
    public insert(asset: Asset): void {
        if (this._byId.has(asset.id)) {
            throw new DuplicateError(`Asset id already registered: ${asset.id}`, { id: asset.id });
        }
        if (this._byPath.has(asset.libraryPath)) {
            throw new DuplicateError(`Library path already in use: ${asset.libraryPath}`, { libraryPath: asset.libraryPath });
        }
        this._index(CloneAsset(asset));
    }

    /**
     * Drops an asset from the index.
     * @returns Asset - The removed asset
     * @throws NotFoundError
     */
    public remove(id: string): Asset {
        const existing = this._require(id);
        this._unindex(existing);
        return CloneAsset(existing);
    }

    /**
     * Swaps the stored asset for `asset`, keeping its position.
     * @throws NotFoundError | ValidationError (id mismatch) | DuplicateError (path clash)
     */
    public replace(id: string, asset: Asset): void {
        const existing = this._require(id);

        if (asset.id !== id) {
            throw new ValidationError(`Asset id cannot change`, { id, next: asset.id });
        }
        const holder = this._byPath.get(asset.libraryPath);
        if (holder !== undefined && holder !== id) {
            throw new DuplicateError(`Library path already in use: ${asset.libraryPath}`, { libraryPath: asset.libraryPath });
        }
        this._byCategory.get(existing.category)?.delete(id);
        this._byPath.delete(existing.libraryPath);
        this._index(CloneAsset(asset));
    }

    /** @throws NotFoundError */
    public getById(id: string): Asset {
        return CloneAsset(this._require(id));
    }

    public has(id: string): boolean {
        return this._byId.has(id);
    }

    /** True when a live asset occupies the root-relative path. */
    public isPathTaken(libraryPath: string): boolean {
        return this._byPath.has(libraryPath);
    }

    /** All assets in insertion order. */
    public all(): Asset[] {
        return [...this._byId.values()].map(CloneAsset);
    }

    /**
     * Case-insensitive substring match against name, description and tags.
     * A blank keyword matches everything. Results keep insertion order.
     * @example
     * registry.search('blue'); // 'BluePrint_A', and 'Rock' tagged 'blueish'
     */
    public search(keyword: string, category?: string): Asset[] {
        const needle = keyword.trim().toLowerCase();
        const pool = category === undefined ? [...this._byId.values()] : this._members(category);

        return pool
            .filter(asset => {
                return needle.length === 0 || AssetRegistry.Matches(asset, needle);
            })
            .map(CloneAsset);
    }

    /** Exact category match; an unknown category yields an empty list. */
    public filterByCategory(category: string): Asset[] {
        return this._members(category).map(CloneAsset);
    }

    /** Number of assets filed under a category. */
    public countInCategory(category: string): number {
        return this._byCategory.get(category)?.size ?? 0;
    }

    /** Whether `asset` matches an already lower-cased needle. */
    public static Matches(asset: Asset, needle: string): boolean {
        if (asset.name.toLowerCase().includes(needle) || asset.description.toLowerCase().includes(needle)) {
            return true;
        }
        return asset.tags.some(tag => {
            return tag.toLowerCase().includes(needle);
        });
    }

    private _members(category: string): Asset[] {
        const ids = this._byCategory.get(category);

        if (!ids) {
            return [];
        }
        // walk _byId so the result keeps insertion order even after replace()
        return [...this._byId.values()].filter(asset => {
            return ids.has(asset.id);
        });
    }

    private _require(id: string): Asset {
        const asset = this._byId.get(id);

        if (!asset) {
            throw new NotFoundError(`Asset not found: ${id}`, { id });
        }
        return asset;
    }

    private _index(asset: Asset): void {
        this._byId.set(asset.id, asset);
        this._byPath.set(asset.libraryPath, asset.id);
        let members = this._byCategory.get(asset.category);
        if (!members) {
            members = new Set();
            this._byCategory.set(asset.category, members);
        }
        members.add(asset.id);
    }

    private _unindex(asset: Asset): void {
        this._byId.delete(asset.id);
        this._byPath.delete(asset.libraryPath);
        const members = this._byCategory.get(asset.category);
        members?.delete(asset.id);
        if (members && members.size === 0) {
            this._byCategory.delete(asset.category);
        }
    }
}
