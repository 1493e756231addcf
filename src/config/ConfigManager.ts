import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/ErrorHandler';
import { eventBus } from '../core/EventBus';
import { PROFILE_NAMES } from '../patterns/profiles';

export const CONFIG_FILE_NAME = 'hapticlink.config.yaml';

export const ConfigSchema = z.object({
    deviceId: z.string().min(1),
    deviceHost: z.string().min(1),
    devicePort: z.number().int().min(1).max(65535),
    requestTimeoutMs: z.number().int().positive(),
    retryCount: z.number().int().min(1).max(10),
    retryInitialDelayMs: z.number().int().min(0),
    readyStatuses: z.array(z.string().min(1)).min(1),
    // Wire encoding of step intensity: firmware builds disagree on 0-100 vs 0-255.
    intensityScale: z.union([z.literal(100), z.literal(255)]),
    patternProfile: z.enum(PROFILE_NAMES),
    mixedEmotionThreshold: z.number().min(0).max(5),
    mixedIntensityAdjustment: z.number().positive(),
    mixedFrequencyAdjustment: z.number().positive(),
    sensorThreshold: z.number().int().min(0)
});

export type HapticLinkConfig = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof HapticLinkConfig;

export const DEFAULT_CONFIG: HapticLinkConfig = {
    deviceId: 'haptic_device',
    deviceHost: '192.168.4.1',
    devicePort: 80,
    requestTimeoutMs: 5000,
    retryCount: 3,
    retryInitialDelayMs: 1000,
    readyStatuses: ['online', 'ready'],
    intensityScale: 100,
    patternProfile: 'standard',
    mixedEmotionThreshold: 3,
    mixedIntensityAdjustment: 1.1,
    mixedFrequencyAdjustment: 1.2,
    sensorThreshold: 100
};

export function isConfigKey(key: string): key is ConfigKey {
    return Object.prototype.hasOwnProperty.call(ConfigSchema.shape, key);
}

export interface ConfigManagerOptions {
    dataHome?: string;
    /** Reload when the config file changes on disk and emit `config:changed`. */
    watch?: boolean;
    env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

export class ConfigManager {
    private configPath: string;
    private config: HapticLinkConfig;
    private dataHome: string;
    private env: NodeJS.ProcessEnv;
    private watcher: fs.FSWatcher | null = null;
    private reloadTimer: NodeJS.Timeout | null = null;

    constructor(private customPath?: string, options: ConfigManagerOptions = {}) {
        this.env = options.env ?? process.env;
        this.dataHome = options.dataHome || this.env.HAPTICLINK_DATA_DIR || path.join(os.homedir(), '.hapticlink');

        const envConfigPath = this.env.HAPTICLINK_CONFIG_PATH;
        const globalConfigPath = path.join(this.dataHome, CONFIG_FILE_NAME);
        const localConfigPath = path.resolve(process.cwd(), CONFIG_FILE_NAME);

        // custom > env > local > global
        this.configPath = customPath || envConfigPath || (fs.existsSync(localConfigPath) ? localConfigPath : globalConfigPath);

        this.config = this.loadConfig();
        if (options.watch) this.startWatcher();
    }

    private startWatcher() {
        if (!fs.existsSync(this.configPath)) return;

        this.watcher = fs.watch(this.configPath, (eventType) => {
            if (eventType !== 'change') return;
            if (this.reloadTimer) clearTimeout(this.reloadTimer);
            this.reloadTimer = setTimeout(() => {
                this.reloadTimer = null;
                logger.info('ConfigManager: Config file changed on disk, reloading...');
                const oldConfig = { ...this.config };
                this.config = this.loadConfig(true);
                eventBus.emit('config:changed', { oldConfig, newConfig: this.getAll() });
            }, 100);
        });
    }

    private readYaml(filePath: string | undefined, label: string): RawConfig {
        if (!filePath || !fs.existsSync(filePath)) return {};
        try {
            const parsed: unknown = yaml.parse(fs.readFileSync(filePath, 'utf8'));
            if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
                return { ...parsed };
            }
            return {};
        } catch (e) {
            logger.warn(`Error loading ${label} config from ${filePath}: ${errorMessage(e)}`);
            return {};
        }
    }

    private loadConfig(silent: boolean = false): HapticLinkConfig {
        const globalPath = path.join(this.dataHome, CONFIG_FILE_NAME);
        const localPath = path.resolve(process.cwd(), CONFIG_FILE_NAME);
        const explicitPath = this.customPath || this.env.HAPTICLINK_CONFIG_PATH;

        const fileConfig: RawConfig = {
            ...this.readYaml(globalPath, 'global'),
            ...(localPath !== globalPath ? this.readYaml(localPath, 'local') : {}),
            ...(explicitPath && explicitPath !== localPath && explicitPath !== globalPath
                ? this.readYaml(explicitPath, 'custom')
                : {})
        };

        if (!silent) logger.info(`ConfigManager: Config path set to ${this.configPath}`);

        // Env vars only fill keys no config file sets
        const envConfig: RawConfig = {
            deviceHost: this.env.HAPTIC_DEVICE_HOST,
            devicePort: this.env.HAPTIC_DEVICE_PORT !== undefined ? Number(this.env.HAPTIC_DEVICE_PORT) : undefined,
            intensityScale: this.env.HAPTIC_INTENSITY_SCALE !== undefined ? Number(this.env.HAPTIC_INTENSITY_SCALE) : undefined
        };

        const merged: RawConfig = { ...DEFAULT_CONFIG };
        for (const [key, value] of Object.entries(envConfig)) {
            if (value === undefined) continue;
            if (fileConfig[key] === undefined || fileConfig[key] === null || fileConfig[key] === '') {
                merged[key] = value;
            } else if (!silent) {
                logger.info(`ConfigManager: Ignoring env override for ${key} because config already defines a value.`);
            }
        }
        Object.assign(merged, fileConfig);

        return this.validate(merged);
    }

    /**
     * Invalid keys fall back to their defaults; the rest of the file still applies.
     */
    private validate(raw: RawConfig): HapticLinkConfig {
        const result = ConfigSchema.safeParse(raw);
        if (result.success) return result.data;

        const repaired: RawConfig = { ...raw };
        for (const issue of result.error.issues) {
            const key = String(issue.path[0] ?? '');
            if (isConfigKey(key)) {
                logger.warn(`ConfigManager: Invalid value for ${key} (${issue.message}), using default ${JSON.stringify(DEFAULT_CONFIG[key])}`);
                repaired[key] = DEFAULT_CONFIG[key];
            }
        }
        const retried = ConfigSchema.safeParse(repaired);
        return retried.success ? retried.data : { ...DEFAULT_CONFIG };
    }

    public get<K extends ConfigKey>(key: K): HapticLinkConfig[K] {
        return this.config[key];
    }

    /**
     * Validates, applies and persists a single key. Returns false (and keeps
     * the old value) when the value does not fit the schema.
     */
    public set<K extends ConfigKey>(key: K, value: HapticLinkConfig[K]): boolean {
        const candidate = ConfigSchema.safeParse({ ...this.config, [key]: value });
        if (!candidate.success) {
            logger.warn(`ConfigManager: Rejected value for '${key}': ${candidate.error.issues[0]?.message ?? 'invalid'}`);
            return false;
        }

        const oldConfig = { ...this.config };
        this.config = candidate.data;
        this.saveConfig();
        eventBus.emit('config:changed', { oldConfig, newConfig: this.getAll() });
        logger.info(`ConfigManager: Config key '${key}' updated and config:changed event emitted`);
        return true;
    }

    public saveConfig() {
        try {
            fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
            fs.writeFileSync(this.configPath, yaml.stringify(this.config));
            logger.info(`Configuration saved to ${this.configPath}`);
        } catch (error) {
            logger.error(`Error saving config: ${errorMessage(error)}`);
        }
    }

    public getAll(): HapticLinkConfig {
        return { ...this.config, readyStatuses: [...this.config.readyStatuses] };
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    public getDataHome(): string {
        return this.dataHome;
    }

    public close() {
        if (this.reloadTimer) clearTimeout(this.reloadTimer);
        this.reloadTimer = null;
        this.watcher?.close();
        this.watcher = null;
    }
}
