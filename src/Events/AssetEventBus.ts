/**
 * Event bus used by the asset manager to notify the presentation layer of state changes.
 */
import { EventEmitter } from 'events';
import type { EventName, EventPayloads } from '../Domain/Events.js';
import type { MetricsService } from '../Services/MetricsService.js';
import { DescribeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

/**
 * AssetEventBus carries typed notifications out of the core.
 * One bus per opened library; construct it and pass it in, there is no global instance.
 */
export class AssetEventBus extends EventEmitter {
    private readonly _metrics?: MetricsService; // optional metrics sink

    /**
     * Creates a new AssetEventBus instance.
     * @param metrics MetricsService - Optional counter sink for published events
     * @example
     * const bus = new AssetEventBus(new MetricsService());
     */
    constructor(metrics?: MetricsService) {
        super();
        this._metrics = metrics;
    }

    /**
     * Typed emit helper enforcing known event names and payloads.
     * A throwing listener is logged; it never fails the operation that published the event.
     */
    public Emit<K extends EventName>(eventName: K, payload: EventPayloads[K]): boolean {
        this._metrics?.IncEvent(eventName);
        try {
            return super.emit(eventName, payload);
        } catch(err) {
            log.error(`Listener for '${eventName}' threw: ${DescribeError(err)}`, `AssetEventBus`);
            return true;
        }
    }

    /** Typed on helper enforcing known event names. */
    public On<K extends EventName>(eventName: K, listener: (payload: EventPayloads[K]) => void): this {
        super.on(eventName, listener);
        return this;
    }

    /** Typed off helper. */
    public Off<K extends EventName>(eventName: K, listener: (payload: EventPayloads[K]) => void): this {
        super.off(eventName, listener);
        return this;
    }
}
