export { loadEngineConfig, defaultEngineConfig, ConfigError } from './engine';
export type { EngineConfig } from './engine';
