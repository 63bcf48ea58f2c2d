// src/schema/index.ts

export * from './raw';
export * from './config';
export * from './validate';
