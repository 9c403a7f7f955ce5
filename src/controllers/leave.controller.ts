import { AppContext } from '../container';
import { AsyncRequestHandler } from '../middleware/asyncHandler';
import { pickBoolean, parseId, pickStrings } from '../utils/request';

export type LeaveController = Record<
  | 'applyLeave'
  | 'getLeaveRecord'
  | 'cancelLeave'
  | 'processLeave'
  | 'getPendingApprovals'
  | 'getNotifications'
  | 'markNotificationRead',
  AsyncRequestHandler
>;

export function createLeaveController(
  { leaveService, reportService, notifications }: Pick<AppContext, 'leaveService' | 'reportService' | 'notifications'>
): LeaveController {
  return {
    // ─── Apply ─────────────────────────────────────────────────────────────────

    async applyLeave(req, res) {
      const fields = pickStrings(req.body, ['employee', 'leave_type', 'start_date', 'end_date'] as const);
      if (!fields) {
        res.status(400).json({
          success: false,
          message: 'Required fields: employee, leave_type, start_date, end_date',
        });
        return;
      }

      const leaveRecord = await leaveService.applyLeave(fields);
      res.status(201).json({
        success: true,
        data: leaveRecord,
        message: `Leave request submitted for ${fields.employee} (${fields.leave_type}) from ${fields.start_date} to ${fields.end_date}.`,
      });
    },

    // ─── Get Leave Record ──────────────────────────────────────────────────────

    async getLeaveRecord(req, res) {
      const id = parseId(req.params.id);
      const leaveRecord = id === null ? null : await reportService.getLeaveRecord(id);
      if (!leaveRecord) {
        res.status(404).json({ success: false, message: 'Leave request not found' });
        return;
      }
      res.json({ success: true, data: leaveRecord });
    },

    // ─── Cancel ────────────────────────────────────────────────────────────────

    async cancelLeave(req, res) {
      const id = parseId(req.params.id);
      const fields = pickStrings(req.body, ['employee'] as const);
      if (id === null || !fields) {
        res.status(400).json({ success: false, message: 'A numeric leave id and employee are required' });
        return;
      }

      const leaveRecord = await leaveService.cancelLeave(fields.employee, id);
      res.json({ success: true, data: leaveRecord, message: `Leave ID ${id} cancelled.` });
    },

    // ─── Approve / Reject ──────────────────────────────────────────────────────

    async processLeave(req, res) {
      const id = parseId(req.params.id);
      const fields = pickStrings(req.body, ['manager'] as const);
      const approve = pickBoolean(req.body, 'approve');
      if (id === null || !fields || approve === null) {
        res.status(400).json({
          success: false,
          message: 'A numeric leave id, manager and boolean approve are required',
        });
        return;
      }

      const leaveRecord = await leaveService.processLeave(fields.manager, id, approve);
      res.json({ success: true, data: leaveRecord, message: `Leave ${leaveRecord.status}.` });
    },

    // ─── Pending Approvals ─────────────────────────────────────────────────────

    async getPendingApprovals(req, res) {
      const requests = await reportService.getPendingApprovals(req.params.managerId ?? '');
      res.json({ success: true, data: requests });
    },

    // ─── Notifications ─────────────────────────────────────────────────────────

    async getNotifications(req, res) {
      const unreadOnly = req.query.unread === 'true';
      const inbox = await notifications.getNotifications(req.params.employeeId ?? '', unreadOnly);
      res.json({ success: true, data: inbox });
    },

    async markNotificationRead(req, res) {
      const id = parseId(req.params.id);
      const marked = id !== null && await notifications.markAsRead(id);
      if (!marked) {
        res.status(404).json({ success: false, message: 'Notification not found' });
        return;
      }
      res.json({ success: true, message: 'Notification marked as read' });
    },
  };
}
