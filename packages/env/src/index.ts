export { getConfig, parseConfig, resetConfig, type AppConfig } from './config.js';
