// src/schema/index.ts

export * from './config';
export * from './extension';
