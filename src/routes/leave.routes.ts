import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { LeaveController } from '../controllers/leave.controller';

export function createLeaveRoutes(controller: LeaveController): Router {
  const router = Router();

  // Pending approvals
  router.get('/pending/:managerId', asyncHandler(controller.getPendingApprovals));

  // Notifications
  router.get('/notifications/:employeeId', asyncHandler(controller.getNotifications));
  router.patch('/notifications/:id/read', asyncHandler(controller.markNotificationRead));

  // Leave requests
  router.post('/', asyncHandler(controller.applyLeave));
  router.get('/:id', asyncHandler(controller.getLeaveRecord));

  // Cancellation / Approval / Rejection
  router.post('/:id/cancel', asyncHandler(controller.cancelLeave));
  router.post('/:id/process', asyncHandler(controller.processLeave));

  return router;
}
