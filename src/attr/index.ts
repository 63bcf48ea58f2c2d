// src/attr/index.ts

export * from './errors';
export * from './frozen-map';
export * from './label';
export * from './printer';
export * from './types';
export * from './build-types';
export * from './fileset-entry';
export * from './selector';
export * from './selectable';
export * from './registry';
