import { isAbsolute, resolve } from 'path';
import { rename, writeFile } from 'fs/promises';
import fs from 'fs-extra';
import Joi from 'joi';
import { readConfigFile } from '../Common/ConfigReader.js';
import { Configurator } from '../Common/Configurator.js';
import { ConfigurationError, DescribeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { AssetEventBus } from '../Events/AssetEventBus.js';
import type { ConfigFile, ValidatedConfig } from '../Types/Config.js';

/** Documented defaults applied to every missing key. */
export const CONFIG_DEFAULTS: ConfigFile = {
    asset_library_path: null,
    default_category: `Default`,
    auto_generate_thumbnail: true,
    thumbnail_size: [256, 256],
    log_level: `info`,
    import_mode: `copy`,
    store_backup_count: 5,
};

const configSchema = Joi.object<ConfigFile>({
    asset_library_path: Joi.string()
        .allow(null, ``)
        .custom((value: string, helpers) => {
            return value === `` || isAbsolute(value) ? value : helpers.error(`any.invalid`);
        })
        .default(CONFIG_DEFAULTS.asset_library_path),
    default_category: Joi.string().trim().min(1).default(CONFIG_DEFAULTS.default_category),
    auto_generate_thumbnail: Joi.boolean().default(CONFIG_DEFAULTS.auto_generate_thumbnail),
    thumbnail_size: Joi.array()
        .ordered(Joi.number().integer().positive().required(), Joi.number().integer().positive().required())
        .length(2)
        .default(CONFIG_DEFAULTS.thumbnail_size),
    log_level: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(CONFIG_DEFAULTS.log_level),
    import_mode: Joi.string().valid(`copy`, `move`).default(CONFIG_DEFAULTS.import_mode),
    store_backup_count: Joi.number().integer().min(0).default(CONFIG_DEFAULTS.store_backup_count),
}).unknown(true); // unknown keys are ignored, and kept when saving

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Service responsible for loading, validating and saving the installation configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: AssetEventBus;
    /** Path of the last loaded file; Save() writes back to it */
    private _configPath?: string;
    /** Raw document as read, so unknown keys survive a save */
    private _raw: Record<string, unknown> = {};
    private _configurator?: Configurator<ConfigFile>;

    /**
     * @param eventBus AssetEventBus - Bus used for emitting `config:loaded` / `config:error`.
     */
    constructor(eventBus: AssetEventBus) {
        this._eventBus = eventBus;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * Missing file or keys fall back to CONFIG_DEFAULTS; environment overrides win over the file.
     * @param path string - Filesystem path to the config. Example: './config/config.json'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws ConfigurationError if reading or validation fails.
     * @example
     * const configService = new ConfigService(bus);
     * const config = await configService.Load('./config/config.json');
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        try {
            const parsed = await readConfigFile(path);
            this._raw = isRecord(parsed) ? parsed : {};

            // Env overrides (highest precedence)
            const overrides: Record<string, unknown> = {};
            const envLibraryPath = process.env.ASSET_LIBRARY_PATH;
            const envLogLevel = process.env.ASSET_LOG_LEVEL;

            if (envLibraryPath) {
                overrides.asset_library_path = resolve(envLibraryPath);
            }
            if (envLogLevel) {
                overrides.log_level = envLogLevel;
            }
            this._configurator = new Configurator(configSchema, this._raw, overrides);
            this._configPath = path;
            this._eventBus.Emit(`config:loaded`, { path });
            log.debug(`Configuration loaded from ${path}`, `ConfigService`);
            return this.Current();
        } catch(err) {
            const reason = DescribeError(err);
            this._eventBus.Emit(`config:error`, { path, reason });
            throw new ConfigurationError(`Failed to load config from '${path}': ${reason}`, { path }, err);
        }
    }

    /**
     * Returns the active configuration.
     * @throws ConfigurationError before the first successful Load()
     */
    public Current(): ValidatedConfig {
        if (!this._configurator) {
            throw new ConfigurationError(`Configuration has not been loaded`);
        }
        return ConfigService.ToValidated(this._configurator.getConfig());
    }

    /**
     * Applies changes to the active configuration and writes it back to the loaded file.
     * Environment overrides are not written. The write goes to a temporary sibling first and then replaces the file.
     * @param changes Partial<ValidatedConfig> - Fields to change
     * @throws ConfigurationError if the result is invalid or the file cannot be written
     */
    public async Save(changes: Partial<ValidatedConfig>): Promise<ValidatedConfig> {
        if (!this._configurator || !this._configPath) {
            throw new ConfigurationError(`Configuration has not been loaded`);
        }
        try {
            this._configurator.update(ConfigService.ToFile(changes));
        } catch(err) {
            throw new ConfigurationError(`Invalid configuration change: ${DescribeError(err)}`, { changes }, err);
        }
        // environment overrides stay out of the file
        const document = { ...this._raw, ...this._configurator.getDocument() };
        const target = this._configPath;
        const temp = `${target}.tmp`;

        try {
            let text: string;

            if (/\.ya?ml$/i.test(target)) {
                const yaml = await import('js-yaml');
                text = yaml.dump(document);
            } else {
                text = `${JSON.stringify(document, null, 2)}\n`;
            }
            await fs.ensureFile(temp);
            await writeFile(temp, text, `utf-8`);
            await rename(temp, target);
            this._raw = document;
        } catch(err) {
            await fs.remove(temp);
            throw new ConfigurationError(`Failed to write config '${target}': ${DescribeError(err)}`, { path: target }, err);
        }
        log.info(`Configuration saved to ${target}`, `ConfigService`);
        return this.Current();
    }

    /** Maps the on-disk document to the camelCase runtime shape. */
    public static ToValidated(file: ConfigFile): ValidatedConfig {
        return {
            libraryPath: file.asset_library_path ? file.asset_library_path : undefined,
            defaultCategory: file.default_category,
            autoGenerateThumbnail: file.auto_generate_thumbnail,
            thumbnailSize: { width: file.thumbnail_size[0], height: file.thumbnail_size[1] },
            logLevel: file.log_level,
            importMode: file.import_mode,
            storeBackupCount: file.store_backup_count,
        };
    }

    /** Maps runtime fields back to their on-disk keys; absent fields are omitted. */
    public static ToFile(config: Partial<ValidatedConfig>): Partial<ConfigFile> {
        const file: Partial<ConfigFile> = {};

        if (`libraryPath` in config) {
            file.asset_library_path = config.libraryPath ?? null;
        }
        if (config.defaultCategory !== undefined) {
            file.default_category = config.defaultCategory;
        }
        if (config.autoGenerateThumbnail !== undefined) {
            file.auto_generate_thumbnail = config.autoGenerateThumbnail;
        }
        if (config.thumbnailSize !== undefined) {
            file.thumbnail_size = [config.thumbnailSize.width, config.thumbnailSize.height];
        }
        if (config.logLevel !== undefined) {
            file.log_level = config.logLevel;
        }
        if (config.importMode !== undefined) {
            file.import_mode = config.importMode;
        }
        if (config.storeBackupCount !== undefined) {
            file.store_backup_count = config.storeBackupCount;
        }
        return file;
    }

    /**
     * Validates a partial configuration without touching disk; handy for embedding the core.
     * @throws ConfigurationError on invalid values
     */
    public static FromObject(raw: Partial<ConfigFile>): ValidatedConfig {
        try {
            return ConfigService.ToValidated(new Configurator(configSchema, raw).getConfig());
        } catch(err) {
            throw new ConfigurationError(`Invalid configuration: ${DescribeError(err)}`, undefined, err);
        }
    }
}
