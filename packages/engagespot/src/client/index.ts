export * from './engagespot.js';
export * from './http-client.js';
