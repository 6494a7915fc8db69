import type { LogThreshold } from '../Common/Log.js';
import type { ThumbnailSize } from '../Domain/Repository.js';

/** How source content is brought into the library tree. */
export type ImportMode = `copy` | `move`;

/**
 * Installation configuration document as stored on disk (snake_case keys).
 */
export interface ConfigFile {
    asset_library_path: string | null; // absolute path, null until first configured
    default_category: string;
    auto_generate_thumbnail: boolean;
    thumbnail_size: [number, number]; // [width, height]
    log_level: LogThreshold;
    import_mode: ImportMode;
    store_backup_count: number; // how many previous store files to keep
}

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    libraryPath?: string; // absolute; undefined at first run
    defaultCategory: string;
    autoGenerateThumbnail: boolean;
    thumbnailSize: ThumbnailSize;
    logLevel: LogThreshold;
    importMode: ImportMode;
    storeBackupCount: number;
}
