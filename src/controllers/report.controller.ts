import { AppContext } from '../container';
import { AsyncRequestHandler } from '../middleware/asyncHandler';

export type ReportController = Record<'getLeaveReport' | 'getPolicies' | 'getPolicy', AsyncRequestHandler>;

export function createReportController(
  { policies, reportService }: Pick<AppContext, 'policies' | 'reportService'>
): ReportController {
  return {
    async getLeaveReport(_req, res) {
      res.json({ success: true, data: await reportService.leaveReport() });
    },

    async getPolicies(_req, res) {
      res.json({ success: true, data: policies.getAllPolicies() });
    },

    async getPolicy(req, res) {
      const leaveType = req.params.leaveType ?? '';
      const policy = policies.getPolicy(leaveType);
      if (!policy) {
        res.status(404).json({ success: false, message: 'Leave type not found.' });
        return;
      }
      res.json({ success: true, data: { ...policy, description: policies.describePolicy(leaveType) } });
    },
  };
}
