import { LeaveEventBus } from './emitter';
import { Notifier } from '../services/notification.service';
import { createNotificationHandlers } from './handlers/notification.handler';

/**
 * Register all event handlers.
 *
 * The lifecycle operation has already committed when these run. To add a
 * downstream action, register another handler here.
 */
export function registerAllHandlers(events: LeaveEventBus, notifier: Notifier) {
  const notifications = createNotificationHandlers(notifier);

  events.onLeaveEvent('leave.applied', notifications.handleAppliedNotification);
  events.onLeaveEvent('leave.cancelled', notifications.handleCancellationNotification);
  events.onLeaveEvent('leave.approved', notifications.handleDecisionNotification);
  events.onLeaveEvent('leave.rejected', notifications.handleDecisionNotification);

  console.log('[EventBus] All handlers registered');
}
