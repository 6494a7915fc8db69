/**
 * Startup wiring: configuration, logging threshold, event bus, metrics and the asset manager.
 */
import { SetLogLevel, log } from '../Common/Log.js';
import { AssetEventBus } from '../Events/AssetEventBus.js';
import { AssetManager } from '../Services/AssetManager.js';
import type { LibraryServicesFactory } from '../Services/AssetManager.js';
import { ConfigService } from '../Services/ConfigService.js';
import { MetricsService } from '../Services/MetricsService.js';

export interface OpenAssetLibraryOptions {
    services?: LibraryServicesFactory;
}

/** Everything a host application needs to drive one library. */
export interface AssetLibrary {
    manager: AssetManager;
    configService: ConfigService;
    eventBus: AssetEventBus;
    metrics: MetricsService;
}

/**
 * Loads the configuration at `configPath` (JSON or YAML; a missing file means defaults)
 * and opens the configured library.
 * @param configPath string - Config file path, defaults to CONFIG_PATH or './config/config.json'
 * @throws ConfigurationError if the configuration is invalid
 * @example
 * const { manager } = await OpenAssetLibrary('./config/config.yaml');
 * await manager.setLibraryPath('/data/assets');
 */
export async function OpenAssetLibrary(
    configPath: string = process.env.CONFIG_PATH || `./config/config.json`,
    options: OpenAssetLibraryOptions = {},
): Promise<AssetLibrary> {
    const metrics = new MetricsService();
    const eventBus = new AssetEventBus(metrics);
    const configService = new ConfigService(eventBus);
    const config = await configService.Load(configPath);

    SetLogLevel(config.logLevel);
    log.info(`Opening asset library (config: ${configPath})`, `Setup`);

    const manager = await AssetManager.Open({ config, eventBus, metrics, configService, services: options.services });
    return { manager, configService, eventBus, metrics };
}
