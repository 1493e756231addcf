export * from './patterns/types';
export * from './patterns/emotion';
export * from './patterns/presets';
export * from './patterns/profiles';
export * from './patterns/PatternGenerator';
export * from './patterns/commands';

export * from './devices/types';
export * from './devices/errors';
export * from './devices/BaseDeviceController';
export * from './devices/HapticDeviceController';
export * from './devices/DeviceManager';

export * from './emotion/TouchEmotionModel';
export * from './emotion/emoji';

export * from './skills/hapticTools';

export { SkillsManager } from './core/SkillsManager';
export type { HapticContext, Skill } from './core/SkillsManager';
export { EventBus, eventBus } from './core/EventBus';
export type { HapticEvents, HapticEventName } from './core/EventBus';
export { ErrorClassifier, ErrorType } from './core/ErrorClassifier';
export type { ClassifiedError } from './core/ErrorClassifier';
export { ConfigManager, ConfigSchema, DEFAULT_CONFIG, CONFIG_FILE_NAME, isConfigKey } from './config/ConfigManager';
export type { HapticLinkConfig, ConfigKey, ConfigManagerOptions } from './config/ConfigManager';
export { ErrorHandler, errorMessage } from './utils/ErrorHandler';
export type { RetryOptions } from './utils/ErrorHandler';
export { logger } from './utils/logger';
