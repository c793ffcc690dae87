export * from './types';
export * from './errors';
export * from './version-tag';
export * from './serving-platform';
export * from './artifact-locator';
export * from './endpoint-prober';
export * from './lifecycle-decision';
export * from './config-registrar';
export * from './transition-executor';
export * from './outcome-recorder';
export * from './orchestrator';
