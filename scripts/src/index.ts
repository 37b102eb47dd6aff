/**
 * gcc-forge - Index
 * Export main modules
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './env.js';
export * from './logger.js';
export * from './exec.js';
export * from './host.js';
export * from './resolver.js';
export * from './sources.js';
export * from './prebuilts.js';
export * from './workspace.js';
export * from './pipeline.js';
export * from './report.js';
export * from './notify.js';
export * from './publish.js';
export * from './builder.js';
export * from './steps/index.js';
