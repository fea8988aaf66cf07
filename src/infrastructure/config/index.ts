export {
  loadAppConfig,
  parseSimpleYaml,
  appConfigSchema,
  DEFAULT_APP_CONFIG,
  DEFAULT_CONFIG_PATH,
} from './app-config.js';
export type { AppConfig } from './app-config.js';
