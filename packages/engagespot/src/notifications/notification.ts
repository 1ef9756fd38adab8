import { NotificationItem, type NotificationItemPayload } from './notification-item.js';

/**
 * Body of POST /notifications.
 */
export interface NotificationPayload<T = string> {
  notification: NotificationItemPayload;
  recipients: string[];
  data?: T;
  category?: string;
}

export interface NotificationInit<T> {
  notification: NotificationItem;
  recipients: readonly string[];
  data?: T;
  category?: string;
}

/**
 * A built notification, ready to hand to `Engagespot.send`.
 * Use `NotificationBuilder` to create one.
 */
export class Notification<T = string> {
  readonly notification: NotificationItem;
  /** Email addresses or user identifiers. */
  readonly recipients: readonly string[];
  /** Additional JSON-serializable data sent with the notification. */
  readonly data?: T;
  /** When absent, the notification goes to every subscriber of the app. */
  readonly category?: string;

  constructor(init: NotificationInit<T>) {
    this.notification = init.notification;
    this.recipients = Object.freeze([...init.recipients]);
    this.data = init.data;
    this.category = init.category;
  }

  toJSON(): NotificationPayload<T> {
    return {
      notification: this.notification.toJSON(),
      recipients: [...this.recipients],
      ...(this.data !== undefined && { data: this.data }),
      ...(this.category !== undefined && { category: this.category }),
    };
  }
}
