import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { EmployeeController } from '../controllers/employee.controller';

export function createEmployeeRoutes(controller: EmployeeController): Router {
  const router = Router();

  router.get('/', asyncHandler(controller.getAllEmployees));
  router.get('/:id', asyncHandler(controller.getEmployee));
  router.get('/:id/reports', asyncHandler(controller.getDirectReports));
  router.get('/:id/balances', asyncHandler(controller.getEmployeeBalances));
  router.get('/:id/leaves', asyncHandler(controller.getEmployeeLeaves));

  return router;
}
