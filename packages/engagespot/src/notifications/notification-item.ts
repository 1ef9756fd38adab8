/**
 * Display content of a single notification: the title plus optional message,
 * click-through url and icon.
 */
export interface NotificationItemPayload {
  title: string;
  message?: string;
  url?: string;
  icon?: string;
}

/**
 * Immutable notification item. Every setter returns a new item with one
 * field replaced, so an item can be shared between builders safely.
 *
 * @example
 * const item = new NotificationItem('Title')
 *   .message('Message')
 *   .url('https://example.com')
 *   .icon('favicon.png');
 */
export class NotificationItem {
  private fields: Readonly<NotificationItemPayload>;

  constructor(title: string) {
    this.fields = { title };
  }

  /**
   * Create an item with title, message, url and icon in one call.
   */
  static withArgs(title: string, message: string, url: string, icon: string): NotificationItem {
    return new NotificationItem(title).message(message).url(url).icon(icon);
  }

  private static from(fields: NotificationItemPayload): NotificationItem {
    const item = new NotificationItem(fields.title);
    item.fields = fields;
    return item;
  }

  title(title: string): NotificationItem {
    return NotificationItem.from({ ...this.fields, title });
  }

  message(message: string): NotificationItem {
    return NotificationItem.from({ ...this.fields, message });
  }

  url(url: string): NotificationItem {
    return NotificationItem.from({ ...this.fields, url });
  }

  icon(icon: string): NotificationItem {
    return NotificationItem.from({ ...this.fields, icon });
  }

  toJSON(): NotificationItemPayload {
    const { title, message, url, icon } = this.fields;
    return {
      title,
      ...(message !== undefined && { message }),
      ...(url !== undefined && { url }),
      ...(icon !== undefined && { icon }),
    };
  }
}
