// src/index.ts

export * from './attr';
export * from './schema';

export * from './core/config-loader';
export * from './core/runner';
export * from './core/watcher';

export * from './util/logger';
