import type { AssetStore, StoreSnapshot } from '../Domain/Repository.js';
import { CloneAsset } from '../Domain/Asset.js';
import { CorruptStoreError, PersistenceError } from '../Common/Errors.js';

function copySnapshot(snapshot: StoreSnapshot): StoreSnapshot {
    return {
        assets: snapshot.assets.map(CloneAsset),
        categories: [...snapshot.categories],
    };
}

/**
 * In-memory implementation of AssetStore for embedding and tests.
 * Failures can be injected to exercise rollback paths.
 */
export class InMemoryAssetStore implements AssetStore {
    private _snapshot: StoreSnapshot;
    private _failNextSaves = 0;
    private _corrupt = false;
    /** Number of successful saves */
    public saveCount = 0;

    constructor(initial: StoreSnapshot = { assets: [], categories: [] }) {
        this._snapshot = copySnapshot(initial);
    }

    async load(): Promise<StoreSnapshot> {
        if (this._corrupt) {
            throw new CorruptStoreError(`In-memory store marked corrupt`);
        }
        return copySnapshot(this._snapshot);
    }

    async save(snapshot: StoreSnapshot): Promise<void> {
        if (this._failNextSaves > 0) {
            this._failNextSaves--;
            throw new PersistenceError(`Injected save failure`);
        }
        this._snapshot = copySnapshot(snapshot);
        this.saveCount++;
    }

    async quarantine(): Promise<string | undefined> {
        if (!this._corrupt) {
            return undefined;
        }
        this._corrupt = false;
        this._snapshot = { assets: [], categories: [] };
        return `memory://quarantine`;
    }

    /** Makes the next `count` saves throw PersistenceError. */
    failNextSaves(count = 1): void {
        this._failNextSaves = count;
    }

    /** Makes load() throw CorruptStoreError until quarantined. */
    markCorrupt(): void {
        this._corrupt = true;
    }

    /** Copy of the last saved snapshot (for testing purposes) */
    peek(): StoreSnapshot {
        return copySnapshot(this._snapshot);
    }
}
