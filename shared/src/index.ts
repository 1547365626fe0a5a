// Core types and enums for the SKIEN news threads importer
export * from './enums.js';
export * from './stories.js';
export * from './review.js';
export * from './imports.js';
export * from './api.js';
