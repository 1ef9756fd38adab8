export * from './environment-config.js';
