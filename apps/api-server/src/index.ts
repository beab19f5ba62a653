export { createApp, APP_VERSION, type CreateAppOptions } from './app.js';
export { loadConfig, envSuffix, ConfigError, type AppConfig } from './config.js';
export { createHubServices, type HubServices, type HubOverrides } from './hub-bridge.js';
