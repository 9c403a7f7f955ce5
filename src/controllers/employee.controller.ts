import { AppContext } from '../container';
import { AsyncRequestHandler } from '../middleware/asyncHandler';
import { isLeaveStatus } from '../types';

export type EmployeeController = Record<
  'getAllEmployees' | 'getEmployee' | 'getDirectReports' | 'getEmployeeBalances' | 'getEmployeeLeaves',
  AsyncRequestHandler
>;

export function createEmployeeController(
  { directory, reportService }: Pick<AppContext, 'directory' | 'reportService'>
): EmployeeController {
  return {
    async getAllEmployees(_req, res) {
      res.json({ success: true, data: directory.getAllEmployees() });
    },

    async getEmployee(req, res) {
      const employee = directory.getEmployeeById(req.params.id ?? '');
      if (!employee) {
        res.status(404).json({ success: false, message: 'Employee not found' });
        return;
      }
      res.json({ success: true, data: employee });
    },

    async getDirectReports(req, res) {
      res.json({ success: true, data: directory.getDirectReports(req.params.id ?? '') });
    },

    async getEmployeeBalances(req, res) {
      const balances = await reportService.getLeaveBalance(req.params.id ?? '');
      res.json({ success: true, data: balances });
    },

    /**
     * All of an employee's records, or only those with a non-empty `?status=`.
     */
    async getEmployeeLeaves(req, res) {
      const employee = req.params.id ?? '';
      const { status } = req.query;

      if (status === undefined || status === '') {
        res.json({ success: true, data: await reportService.listLeaveRecords(employee) });
        return;
      }
      if (!isLeaveStatus(status)) {
        res.status(400).json({
          success: false,
          message: 'status must be pending, approved, rejected, or cancelled',
        });
        return;
      }
      res.json({ success: true, data: await reportService.getFilteredLeaveRecords(employee, status) });
    },
  };
}
