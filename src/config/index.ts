export { loadRuntimeConfig, type RuntimeConfig } from './runtime_config.js';
