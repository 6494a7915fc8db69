import type { ObjectSchema } from 'joi';

/**
 * Configurator validates configuration with a Joi schema in two layers: the document as it lives
 * on disk, and an overlay (environment overrides) applied on top of it but never written back.
 * Defaults declared in the schema are applied to both layers.
 * @template T - The expected shape of the validated configuration object
 */
export class Configurator<T extends object> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Validated file layer */
    private _document: T;
    /** Session-only values, keyed like the document */
    private _overlay: Record<string, unknown>;
    /** Document with the overlay applied */
    private _effective: T;

    /**
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param document unknown - Raw file document
     * @param overlay Record<string, unknown> - Values that win over the document for this session only
     * @throws Joi.ValidationError if either layer fails validation
     * @example
     * const configurator = new Configurator(configSchema, { thumbnail_size: [256, 256] }, { log_level: 'debug' });
     * configurator.getConfig().log_level; // 'debug'
     * configurator.getDocument().log_level; // 'info' (schema default)
     */
    constructor(schema: ObjectSchema<T>, document: unknown, overlay: Record<string, unknown> = {}) {
        this._schema = schema;
        this._document = this._validate(document);
        this._overlay = { ...overlay };
        this._effective = this._validate({ ...this._document, ...this._overlay });
    }

    /** Effective configuration. */
    public getConfig(): T {
        return this._effective;
    }

    /** The file layer alone, as it should be written back. */
    public getDocument(): T {
        return this._document;
    }

    /**
     * Applies `changes` to the file layer. Keys it sets leave the overlay, so an explicit change
     * wins over an override for the rest of the session.
     * @throws Joi.ValidationError if validation fails; nothing is stored then
     */
    public update(changes: Partial<T>): void {
        const document = this._validate({ ...this._document, ...changes });
        const overlay = { ...this._overlay };

        for (const key of Object.keys(changes)) {
            delete overlay[key];
        }
        this._effective = this._validate({ ...document, ...overlay });
        this._document = document;
        this._overlay = overlay;
    }

    private _validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig, { abortEarly: false });

        if (error) {
            throw error;
        }
        return value;
    }
}
