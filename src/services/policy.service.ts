import { LeaveTypePolicy } from '../types';
import { LeaveError } from '../utils/errors';

export class PolicyStore {
  private readonly policies: ReadonlyMap<string, Readonly<LeaveTypePolicy>>;

  constructor(policies: LeaveTypePolicy[]) {
    this.policies = new Map(policies.map((p) => [p.leave_type, Object.freeze({ ...p })]));
  }

  getPolicy(leaveType: string): Readonly<LeaveTypePolicy> | null {
    return this.policies.get(leaveType) ?? null;
  }

  getAllPolicies(): Readonly<LeaveTypePolicy>[] {
    return [...this.policies.values()];
  }

  /**
   * Human-readable summary of one leave type's policy.
   */
  describePolicy(leaveType: string): string {
    const policy = this.getPolicy(leaveType);
    if (!policy) throw new LeaveError('NotFound', 'Leave type not found.');

    const title = leaveType.charAt(0).toUpperCase() + leaveType.slice(1).toLowerCase();
    return [
      `${title} Leave Policy:`,
      `- Max days: ${policy.max_days} per year`,
      `- Min advance notice: ${policy.min_notice_days} days`,
    ].join('\n');
  }
}
