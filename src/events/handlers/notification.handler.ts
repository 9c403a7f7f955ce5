import { LeaveEvent } from '../../types';
import { Notifier } from '../../services/notification.service';

export interface NotificationHandlers {
  handleAppliedNotification(event: LeaveEvent): Promise<void>;
  handleCancellationNotification(event: LeaveEvent): Promise<void>;
  handleDecisionNotification(event: LeaveEvent): Promise<void>;
}

export function createNotificationHandlers(notifier: Notifier): NotificationHandlers {
  return {
    /**
     * Tell the approver a request is waiting. Top-of-hierarchy employees have
     * no approver, so nobody is notified.
     */
    async handleAppliedNotification(event) {
      const lr = event.leaveRecord;
      if (!lr.approver) {
        console.log(`[NotificationHandler] Leave #${lr.id} has no approver; nobody to notify`);
        return;
      }
      await notifier.notify(
        lr.approver,
        `${lr.employee} requested ${lr.leave_type} leave from ${lr.start_date} to ${lr.end_date}`,
        lr.id
      );
    },

    async handleCancellationNotification(event) {
      const lr = event.leaveRecord;
      if (!lr.approver) return;
      await notifier.notify(lr.approver, `${lr.employee} cancelled their leave (ID ${lr.id})`, lr.id);
    },

    /**
     * Tell the employee how their request was decided.
     */
    async handleDecisionNotification(event) {
      const lr = event.leaveRecord;
      await notifier.notify(
        lr.employee,
        `Leave (ID ${lr.id}) has been ${lr.status} by ${event.actor}`,
        lr.id
      );
    },
  };
}
