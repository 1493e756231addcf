import { logger } from '../utils/logger';
import type { VibrationPattern } from '../patterns/types';
import type { BaseDeviceController } from './BaseDeviceController';
import type { DeviceStatus } from './types';

/**
 * Holds several controllers by device id and fans operations out to all of
 * them concurrently. One device failing never affects the others.
 */
export class DeviceManager {
    private controllers: Map<string, BaseDeviceController> = new Map();

    /** Connects first; the controller is kept only when that succeeds. */
    public async addController(controller: BaseDeviceController): Promise<boolean> {
        if (this.controllers.has(controller.deviceId)) {
            logger.warn(`DeviceManager: device '${controller.deviceId}' is already registered`);
            return false;
        }
        if (!(await controller.connect())) {
            logger.error(`DeviceManager: could not connect '${controller.deviceId}'`);
            return false;
        }
        this.controllers.set(controller.deviceId, controller);
        logger.info(`DeviceManager: added '${controller.deviceId}'`);
        return true;
    }

    public async removeController(deviceId: string): Promise<boolean> {
        const controller = this.controllers.get(deviceId);
        if (!controller) return false;
        await controller.disconnect();
        this.controllers.delete(deviceId);
        logger.info(`DeviceManager: removed '${deviceId}'`);
        return true;
    }

    public getController(deviceId: string): BaseDeviceController | undefined {
        return this.controllers.get(deviceId);
    }

    public getDeviceIds(): string[] {
        return [...this.controllers.keys()];
    }

    public async sendPatternToAll(pattern: VibrationPattern): Promise<Record<string, boolean>> {
        return this.fanOut(c => c.sendPattern(pattern), false);
    }

    public async stopAll(): Promise<Record<string, boolean>> {
        return this.fanOut(c => c.stop(), false);
    }

    public async getAllStatus(): Promise<Record<string, DeviceStatus | null>> {
        return this.fanOut(c => c.getStatus(), null);
    }

    public async disconnectAll(): Promise<void> {
        await Promise.allSettled([...this.controllers.values()].map(c => c.disconnect()));
        this.controllers.clear();
    }

    private async fanOut<T>(
        operation: (controller: BaseDeviceController) => Promise<T>,
        onFailure: T
    ): Promise<Record<string, T>> {
        const entries = [...this.controllers.entries()];
        const settled = await Promise.allSettled(entries.map(([, controller]) => operation(controller)));

        const results: Record<string, T> = {};
        settled.forEach((outcome, index) => {
            const deviceId = entries[index][0];
            if (outcome.status === 'fulfilled') {
                results[deviceId] = outcome.value;
            } else {
                logger.error(`DeviceManager: '${deviceId}' failed: ${String(outcome.reason)}`);
                results[deviceId] = onFailure;
            }
        });
        return results;
    }
}
