import { EventEmitter } from 'events';
import type { HapticLinkConfig } from '../config/ConfigManager';
import type { DeviceStatus, DispatchReceipt, SensorReading } from '../devices/types';

export interface HapticEvents {
    'device:connected': { deviceId: string; baseUrl: string; status: DeviceStatus };
    'device:disconnected': { deviceId: string; baseUrl: string };
    'pattern:dispatched': DispatchReceipt;
    'sensor:reading': SensorReading;
    'config:changed': { oldConfig: HapticLinkConfig; newConfig: HapticLinkConfig };
}

export type HapticEventName = keyof HapticEvents;
type Listener<K extends HapticEventName> = (payload: HapticEvents[K]) => void;

/**
 * Process-wide notification bus. Carries observations only (what was
 * dispatched, what connected); no component reads device handles from it.
 */
export class EventBus {
    private emitter = new EventEmitter();

    public emit<K extends HapticEventName>(event: K, payload: HapticEvents[K]): boolean {
        return this.emitter.emit(event, payload);
    }

    public on<K extends HapticEventName>(event: K, listener: Listener<K>): this {
        this.emitter.on(event, listener);
        return this;
    }

    public once<K extends HapticEventName>(event: K, listener: Listener<K>): this {
        this.emitter.once(event, listener);
        return this;
    }

    public off<K extends HapticEventName>(event: K, listener: Listener<K>): this {
        this.emitter.off(event, listener);
        return this;
    }

    public removeAllListeners(event?: HapticEventName): this {
        if (event) {
            this.emitter.removeAllListeners(event);
        } else {
            this.emitter.removeAllListeners();
        }
        return this;
    }

    public listenerCount(event: HapticEventName): number {
        return this.emitter.listenerCount(event);
    }
}

export const eventBus = new EventBus();
