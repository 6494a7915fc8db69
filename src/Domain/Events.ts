/**
 * Event names and payloads published on the asset event bus.
 */
import type { Asset } from './Asset.js';
import type { ImportProgress } from './Requests.js';

/**
 * Central enumeration of well-known event names for typed event bus helpers.
 * Extend as new events are introduced.
 */
export const EVENT_NAMES = {
    assetAdded: 'asset:added',
    assetUpdated: 'asset:updated',
    assetRemoved: 'asset:removed',
    assetsLoaded: 'assets:loaded',
    thumbnailUpdated: 'thumbnail:updated',
    categoryAdded: 'category:added',
    categoryRemoved: 'category:removed',
    importProgress: 'import:progress',
    storeCorrupt: 'store:corrupt',
    libraryChanged: 'library:changed',
    configLoaded: 'config:loaded',
    configError: 'config:error',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/** Payload carried by each event. */
export interface EventPayloads {
    'asset:added': Asset;
    'asset:updated': { before: Asset; after: Asset };
    'asset:removed': { id: string; name: string };
    'assets:loaded': { count: number; libraryRoot: string };
    'thumbnail:updated': { id: string; thumbnailPath: string | undefined };
    'category:added': { name: string };
    'category:removed': { name: string; reassigned: string[] };
    'import:progress': ImportProgress;
    'store:corrupt': { storeFile: string; quarantinedTo?: string; reason: string };
    'library:changed': { previous: string | undefined; current: string };
    'config:loaded': { path: string };
    'config:error': { path: string; reason: string };
}
