/**
 * MetricsService provides in-memory counters for library activity.
 * Lightweight and synchronous; one instance per opened library, passed explicitly.
 *
 * Naming rules follow project conventions: PascalCase for public, _camelCase for private/internal.
 */

export interface MetricsSnapshot {
    importsCompleted: number; // assets successfully added
    importsFailed: number; // addAsset calls that threw (cancellations included)
    thumbnailsGenerated: number; // previews written or icons resolved
    thumbnailFailures: number; // generate calls that yielded no preview
    storeSaves: number; // successful snapshot writes
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

/** Counter fields that can be incremented by name */
export type MetricsCounter = Exclude<keyof MetricsSnapshot, `eventsPublished` | `collectedAt`>;

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _counters: Record<MetricsCounter, number> = MetricsService._zero();
    private _eventsPublished: Record<string, number> = {};

    /** Increment a named counter */
    public Inc(counter: MetricsCounter): void {
        this._counters[counter]++;
    }

    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._eventsPublished[eventName] = (this._eventsPublished[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            ...this._counters,
            eventsPublished: { ...this._eventsPublished },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._counters = MetricsService._zero();
        this._eventsPublished = {};
    }

    private static _zero(): Record<MetricsCounter, number> {
        return {
            importsCompleted: 0,
            importsFailed: 0,
            thumbnailsGenerated: 0,
            thumbnailFailures: 0,
            storeSaves: 0,
        };
    }
}
