/**
 * Engagespot client for Node.js
 *
 * Send multi-channel notifications and manage user attributes through the
 * Engagespot REST API. Credentials come from the Engagespot dashboard.
 *
 * @example
 * import { Engagespot, NotificationBuilder } from 'engagespot';
 *
 * const engagespot = Engagespot.create('api_key', 'api_secret');
 * const notification = new NotificationBuilder('Welcome', ['jane@example.com']).build();
 * const result = await engagespot.send(notification);
 */

export { Engagespot, EngagespotBuilder, createHttpClient, API_KEY_HEADER, API_SECRET_HEADER } from './client/index.js';
export type { EngagespotClientOptions, HttpClientConfig } from './client/index.js';

export { NotificationItem, Notification, NotificationBuilder } from './notifications/index.js';
export type { NotificationItemPayload, NotificationPayload, NotificationInit } from './notifications/index.js';

export { DEFAULT_BASE_URL, loadEngagespotConfig } from './config/index.js';
export type { EngagespotConfig, EnvSource } from './config/index.js';

export { EngagespotError, EngagespotErrorCode, ConfigurationError } from './errors/index.js';

export { getLogger, createLogger, maskSecrets, serializeError } from './logging/index.js';
export type { Logger, SerializedError } from './logging/index.js';

export type {
  EngagespotResult,
  EngagespotSuccess,
  EngagespotFailure,
  EngagespotFailureKind,
  EngagespotHttpFailure,
  EngagespotTransportFailure,
  EngagespotSerializationFailure,
  HttpMethod,
} from './types.js';

export { SDK_VERSION } from './version.js';
