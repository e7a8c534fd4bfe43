export * from './types';
export * from './cloud/index';
export { Settings, type SettingsSource } from './utils/settings';
export {
  loadSettings,
  loadSettingsFile,
  saveSettings,
  getDefaultSettings,
  applyEnvOverrides,
  CONFIG_FILE_NAMES,
} from './utils/config';
export { ConfigurationError, parseProvider, isCloudProvider } from './utils/validators';
export { default as logger, addFileTransport, setLogLevel } from './utils/logger';
