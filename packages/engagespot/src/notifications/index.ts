export * from './notification-item.js';
export * from './notification.js';
export * from './notification-builder.js';
