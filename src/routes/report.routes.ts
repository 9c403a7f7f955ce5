import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { ReportController } from '../controllers/report.controller';

export function createReportRoutes(controller: ReportController): Router {
  const router = Router();

  router.get('/leave', asyncHandler(controller.getLeaveReport));

  return router;
}

export function createPolicyRoutes(controller: ReportController): Router {
  const router = Router();

  router.get('/', asyncHandler(controller.getPolicies));
  router.get('/:leaveType', asyncHandler(controller.getPolicy));

  return router;
}
