import { Notification } from '../types';
import { expectRows, isNotification } from '../types/guards';
import { Queryable } from '../config/database';

/**
 * Delivery side of notifications. The lifecycle engine never awaits or
 * inspects a delivery; see the event handlers.
 */
export interface Notifier {
  notify(recipient: string, message: string, leaveId?: number): Promise<void>;
}

/**
 * A notifier that also keeps every message for later reading. In a real system
 * delivery would also go out by email/Slack/push; here we log and store it.
 */
export interface NotificationInbox extends Notifier {
  getNotifications(recipient: string, unreadOnly?: boolean): Promise<Notification[]>;
  markAsRead(notificationId: number): Promise<boolean>;
}

export class MemoryNotificationInbox implements NotificationInbox {
  private readonly notifications: Notification[] = [];
  private nextId = 1;

  async notify(recipient: string, message: string, leaveId?: number): Promise<void> {
    console.log(`[Notify] ${recipient}: ${message}`);
    this.notifications.push({
      id: this.nextId++,
      recipient,
      message,
      leave_id: leaveId ?? null,
      is_read: false,
      created_at: new Date(),
    });
  }

  async getNotifications(recipient: string, unreadOnly = false): Promise<Notification[]> {
    return this.notifications
      .filter((n) => n.recipient === recipient && (!unreadOnly || !n.is_read))
      .reverse()
      .map((n) => ({ ...n }));
  }

  async markAsRead(notificationId: number): Promise<boolean> {
    const found = this.notifications.find((n) => n.id === notificationId);
    if (!found) return false;
    found.is_read = true;
    return true;
  }
}

const NOTIFICATION_COLUMNS = 'id, recipient_id AS recipient, message, leave_id, is_read, created_at';

export class PgNotificationInbox implements NotificationInbox {
  constructor(private readonly pool: Queryable) {}

  async notify(recipient: string, message: string, leaveId?: number): Promise<void> {
    console.log(`[Notify] ${recipient}: ${message}`);
    await this.pool.query(
      `INSERT INTO notifications (recipient_id, message, leave_id)
       VALUES ($1, $2, $3)`,
      [recipient, message, leaveId ?? null]
    );
  }

  async getNotifications(recipient: string, unreadOnly = false): Promise<Notification[]> {
    let query = `SELECT ${NOTIFICATION_COLUMNS} FROM notifications WHERE recipient_id = $1`;
    if (unreadOnly) query += ' AND is_read = FALSE';
    query += ' ORDER BY id DESC';
    const result = await this.pool.query(query, [recipient]);
    return expectRows(result.rows, isNotification, 'notifications');
  }

  async markAsRead(notificationId: number): Promise<boolean> {
    const result = await this.pool.query('UPDATE notifications SET is_read = TRUE WHERE id = $1', [notificationId]);
    return (result.rowCount ?? 0) > 0;
  }
}
