import { describe, expect, it, vi } from 'vitest';
import { BaseDeviceController } from '../src/devices/BaseDeviceController';
import { DeviceManager } from '../src/devices/DeviceManager';
import type { DeviceStatus } from '../src/devices/types';
import { createCustomPattern } from '../src/patterns/presets';
import type { VibrationPattern } from '../src/patterns/types';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

interface FakeBehaviour {
    reachable?: boolean;
    accepts?: boolean;
    throws?: boolean;
}

// In-process stand-in: no HTTP, just the controller contract.
class FakeController extends BaseDeviceController {
    public sent: VibrationPattern[] = [];
    public disconnects = 0;

    constructor(deviceId: string, private behaviour: FakeBehaviour = {}) {
        super({ deviceId, host: `${deviceId}.local` });
    }

    public async connect(): Promise<boolean> {
        if (this.behaviour.reachable === false) return false;
        this.state = 'connected';
        return true;
    }

    public async disconnect(): Promise<void> {
        this.disconnects++;
        this.state = 'disconnected';
    }

    public async sendPattern(pattern: VibrationPattern): Promise<boolean> {
        if (this.behaviour.throws) throw new Error('socket exploded');
        this.sent.push(pattern);
        return this.behaviour.accepts !== false;
    }

    public async stop(): Promise<boolean> {
        if (this.behaviour.throws) throw new Error('socket exploded');
        return this.isConnected;
    }

    public async getStatus(): Promise<DeviceStatus | null> {
        if (this.behaviour.throws) throw new Error('socket exploded');
        return { status: 'online' };
    }
}

describe('DeviceManager', () => {
    it('keeps only controllers that connect', async () => {
        const manager = new DeviceManager();

        expect(await manager.addController(new FakeController('left'))).toBe(true);
        expect(await manager.addController(new FakeController('right', { reachable: false }))).toBe(false);

        expect(manager.getDeviceIds()).toEqual(['left']);
        expect(manager.getController('right')).toBeUndefined();
    });

    it('rejects a duplicate device id', async () => {
        const manager = new DeviceManager();
        await manager.addController(new FakeController('left'));

        expect(await manager.addController(new FakeController('left'))).toBe(false);
    });

    it('sends to every device and reports per device', async () => {
        const manager = new DeviceManager();
        const left = new FakeController('left');
        const right = new FakeController('right', { accepts: false });
        const broken = new FakeController('broken', { throws: true });
        await manager.addController(left);
        await manager.addController(right);
        await manager.addController(broken);

        const pattern = createCustomPattern('pulse', 1, 200, 1);
        const results = await manager.sendPatternToAll(pattern);

        expect(results).toEqual({ left: true, right: false, broken: false });
        expect(left.sent).toEqual([pattern]);
    });

    it('collects stop and status results', async () => {
        const manager = new DeviceManager();
        await manager.addController(new FakeController('left'));
        await manager.addController(new FakeController('broken', { throws: true }));

        expect(await manager.stopAll()).toEqual({ left: true, broken: false });
        expect(await manager.getAllStatus()).toEqual({ left: { status: 'online' }, broken: null });
    });

    it('disconnects on removal', async () => {
        const manager = new DeviceManager();
        const left = new FakeController('left');
        await manager.addController(left);

        expect(await manager.removeController('left')).toBe(true);
        expect(await manager.removeController('left')).toBe(false);
        expect(left.disconnects).toBe(1);
        expect(manager.getDeviceIds()).toEqual([]);
    });

    it('disconnects everything', async () => {
        const manager = new DeviceManager();
        const left = new FakeController('left');
        const right = new FakeController('right');
        await manager.addController(left);
        await manager.addController(right);

        await manager.disconnectAll();

        expect(left.disconnects).toBe(1);
        expect(right.disconnects).toBe(1);
        expect(manager.getDeviceIds()).toEqual([]);
    });
});
