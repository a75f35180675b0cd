export { ConfigManager, expandHome } from './config.js';
export type { SaveSyncConfig, DeviceConfig } from './config.js';
