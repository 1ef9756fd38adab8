import { NotificationItem } from './notification-item.js';
import { Notification } from './notification.js';

/**
 * Fluent API for building a Notification. Title and recipients are required;
 * everything else is chained.
 *
 * @example
 * const notification = new NotificationBuilder<{ orderId: string }>('Order shipped', ['jane@example.com'])
 *   .message('Your order is on the way')
 *   .url('https://example.com/orders/42')
 *   .data({ orderId: '42' })
 *   .build();
 */
export class NotificationBuilder<T = string> {
  private item: NotificationItem;
  private recipientList: readonly string[];
  private payload?: T;
  private categoryName?: string;

  /**
   * The recipients array is read when `build()` runs, not before.
   */
  constructor(title: string, recipients: readonly string[]) {
    this.item = new NotificationItem(title);
    this.recipientList = recipients;
  }

  notificationItem(item: NotificationItem): this {
    this.item = item;
    return this;
  }

  title(title: string): this {
    this.item = this.item.title(title);
    return this;
  }

  message(message: string): this {
    this.item = this.item.message(message);
    return this;
  }

  url(url: string): this {
    this.item = this.item.url(url);
    return this;
  }

  icon(icon: string): this {
    this.item = this.item.icon(icon);
    return this;
  }

  recipients(recipients: readonly string[]): this {
    this.recipientList = recipients;
    return this;
  }

  data(data: T): this {
    this.payload = data;
    return this;
  }

  category(category: string): this {
    this.categoryName = category;
    return this;
  }

  build(): Notification<T> {
    return new Notification<T>({
      notification: this.item,
      recipients: this.recipientList,
      data: this.payload,
      category: this.categoryName,
    });
  }
}
