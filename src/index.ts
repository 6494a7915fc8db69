/**
 * Public surface of the asset library core.
 */
export type { Asset, AssetKind } from './Domain/Asset.js';
export { ASSET_KINDS, NormalizeTags } from './Domain/Asset.js';
export type { AddAssetOptions, AddAssetRequest, AssetPatch, ImportProgress } from './Domain/Requests.js';
export { ParseAddAssetRequest, ParseAssetPatch } from './Domain/Requests.js';
export type { AssetStore, StoreSnapshot, ThumbnailGenerator, ThumbnailSize } from './Domain/Repository.js';
export { EVENT_NAMES } from './Domain/Events.js';
export type { EventName, EventPayloads } from './Domain/Events.js';
export { ValidateCategoryName } from './Domain/Category.js';

export * from './Common/Errors.js';
export { DescribeAsset, FormatSize } from './Common/Format.js';
export { SetLogLevel, log } from './Common/Log.js';
export type { LogThreshold } from './Common/Log.js';

export { AssetEventBus } from './Events/AssetEventBus.js';
export { JsonAssetStore } from './Repository/JsonAssetStore.js';
export { InMemoryAssetStore } from './Repository/InMemoryAssetStore.js';
export { STORE_VERSION } from './Repository/AssetRecord.js';
export type { AssetRecord, StoreDocument } from './Repository/AssetRecord.js';

export { AssetManager, DefaultLibraryServices } from './Services/AssetManager.js';
export type { AssetManagerOptions, LibraryServices, LibraryServicesFactory, RescanReport } from './Services/AssetManager.js';
export { AssetRegistry } from './Services/AssetRegistry.js';
export { SORT_METHODS, SortAssets } from './Services/AssetSorter.js';
export type { SortMethod } from './Services/AssetSorter.js';
export { CONFIG_DEFAULTS, ConfigService } from './Services/ConfigService.js';
export { MetricsService } from './Services/MetricsService.js';
export type { MetricsSnapshot } from './Services/MetricsService.js';
export { PathManager, STORE_DIR_NAME, STORE_FILE_NAME } from './Services/PathManager.js';
export { FfmpegFrameExtractor, IMAGE_EXTENSIONS, PlanPreview, ThumbnailPipeline, VIDEO_EXTENSIONS } from './Services/ThumbnailPipeline.js';
export type { FrameExtractor, ThumbnailPipelineOptions } from './Services/ThumbnailPipeline.js';
export type { ConfigFile, ImportMode, ValidatedConfig } from './Types/Config.js';

export { OpenAssetLibrary } from './Setup/AssetLibrary.js';
export type { AssetLibrary, OpenAssetLibraryOptions } from './Setup/AssetLibrary.js';
