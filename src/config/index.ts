/**
 * Configuration exports
 */

export * from './defaults';
export * from './types';
export { createDefaultConfig, createConfiguration, getConfigurationSummary } from './config';
export { validateConfig } from './validation';
