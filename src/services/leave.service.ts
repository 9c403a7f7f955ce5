import { ACTIVE_STATUSES, ApplyLeaveDTO, LeaveRecord, LeaveStatus } from '../types';
import { LeaveError } from '../utils/errors';
import { Clock } from '../utils/clock';
import { daysBetween, isIsoDate, leaveDuration } from '../utils/helpers';
import { LeaveEventBus } from '../events/emitter';
import { Directory, getApproverFor } from './employee.service';
import { PolicyStore } from './policy.service';
import { LeaveRecordStore } from './leaveRecord.service';
import { LeaveStore } from './leaveStore';

// ─── State Machine ───────────────────────────────────────────────────────────

const TRANSITIONS: Record<LeaveStatus, readonly LeaveStatus[]> = {
  pending: ['approved', 'rejected', 'cancelled'],
  approved: ['cancelled'],
  rejected: [],
  cancelled: [],
};

export function canTransition(from: LeaveStatus, to: LeaveStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function recordDuration(record: Pick<LeaveRecord, 'start_date' | 'end_date'>): number {
  return leaveDuration(record.start_date, record.end_date);
}

// ─── Lifecycle Engine ────────────────────────────────────────────────────────

export interface LeaveServiceDeps {
  directory: Directory;
  policies: PolicyStore;
  store: LeaveStore;
  clock: Clock;
  events: LeaveEventBus;
}

/**
 * Apply / cancel / process. Each operation checks every precondition and
 * makes its balance and record changes inside one exclusive unit of work on
 * the employee, then emits its event once that work has committed.
 */
export class LeaveService {
  constructor(private readonly deps: LeaveServiceDeps) {}

  async applyLeave(dto: ApplyLeaveDTO): Promise<LeaveRecord> {
    const { directory, policies, store, clock, events } = this.deps;

    const employee = directory.getEmployeeById(dto.employee);
    if (!employee) throw new LeaveError('NotFound', 'Employee not found.');

    const policy = policies.getPolicy(dto.leave_type);
    if (!policy) throw new LeaveError('NotFound', 'Invalid leave type.');

    for (const value of [dto.start_date, dto.end_date]) {
      if (!isIsoDate(value)) {
        throw new LeaveError('InvalidInput', `Invalid date: ${value}. Expected YYYY-MM-DD.`);
      }
    }

    // ── Notice period ───────────────────────────────────────────────────────
    const noticeDays = daysBetween(clock.today(), dto.start_date);
    if (noticeDays < policy.min_notice_days) {
      throw new LeaveError(
        'InsufficientNotice',
        `Minimum ${policy.min_notice_days} days notice required for ${dto.leave_type} leave.`
      );
    }

    const days = leaveDuration(dto.start_date, dto.end_date);
    if (days < 1) throw new LeaveError('InvalidDuration', 'Invalid leave duration.');

    const approver = getApproverFor(employee);

    const leaveRecord = await store.runExclusive(employee.id, async ({ ledger, records }) => {
      // ── Balance, then overlap scan ────────────────────────────────────────
      const available = await ledger.read(employee.id, dto.leave_type);
      if (days > available) {
        throw new LeaveError(
          'InsufficientBalance',
          `Not enough ${dto.leave_type} leave. Available: ${available} days.`
        );
      }

      const conflicts = await records.allOverlapping(
        employee.id, dto.start_date, dto.end_date, ACTIVE_STATUSES
      );
      if (conflicts.length > 0) {
        throw new LeaveError('Conflict', 'Conflicting leave request already exists.');
      }

      await ledger.debit(employee.id, dto.leave_type, days);
      return records.insert({
        employee: employee.id,
        leave_type: dto.leave_type,
        start_date: dto.start_date,
        end_date: dto.end_date,
        status: 'pending',
        approver,
      });
    });

    console.log(
      `[LeaveService] Leave #${leaveRecord.id} submitted by ${employee.id}: ${days} ${dto.leave_type} day(s)`
    );
    events.emitLeaveEvent({ type: 'leave.applied', leaveRecord, actor: employee.id });
    return leaveRecord;
  }

  /**
   * Cancel one of the employee's own pending or approved requests and give the
   * days back. Cancelling twice fails the second time.
   */
  async cancelLeave(employee: string, leaveId: number): Promise<LeaveRecord> {
    const { store, events } = this.deps;

    const leaveRecord = await store.runExclusive(employee, async ({ ledger, records }) => {
      const found = await records.findById(leaveId);
      if (!found || found.employee !== employee || !canTransition(found.status, 'cancelled')) {
        throw new LeaveError('NotFound', 'Leave request not found or already processed.');
      }

      await ledger.credit(employee, found.leave_type, recordDuration(found));
      return this.setStatus(records, found.id, 'cancelled');
    });

    console.log(`[LeaveService] Leave #${leaveId} cancelled by ${employee}`);
    events.emitLeaveEvent({ type: 'leave.cancelled', leaveRecord, actor: employee });
    return leaveRecord;
  }

  /**
   * Approve or reject a pending request. Only the approver fixed on the record
   * may decide it; anyone else gets the same NotFound as for a missing record.
   */
  async processLeave(manager: string, leaveId: number, approve: boolean): Promise<LeaveRecord> {
    const { store, events } = this.deps;
    const decision: LeaveStatus = approve ? 'approved' : 'rejected';

    const isDecidable = (record: LeaveRecord | null): record is LeaveRecord =>
      record !== null && record.approver === manager && canTransition(record.status, decision);

    // A record's employee never changes: find it, lock on it, then re-check.
    const target = await store.read(({ records }) => records.findById(leaveId));
    if (!isDecidable(target)) {
      throw new LeaveError('NotFound', 'Leave ID not found or not authorized.');
    }

    const leaveRecord = await store.runExclusive(target.employee, async ({ ledger, records }) => {
      const found = await records.findById(leaveId);
      if (!isDecidable(found)) {
        throw new LeaveError('NotFound', 'Leave ID not found or not authorized.');
      }

      // Approval keeps the days deducted at apply time.
      if (!approve) {
        await ledger.credit(found.employee, found.leave_type, recordDuration(found));
      }
      return this.setStatus(records, found.id, decision);
    });

    console.log(`[LeaveService] Leave #${leaveId} ${decision} by ${manager}`);
    events.emitLeaveEvent({
      type: approve ? 'leave.approved' : 'leave.rejected',
      leaveRecord,
      actor: manager,
    });
    return leaveRecord;
  }

  private async setStatus(
    records: LeaveRecordStore,
    id: number,
    status: LeaveStatus
  ): Promise<LeaveRecord> {
    const updated = await records.updateStatus(id, status);
    if (!updated) throw new Error(`Leave record #${id} disappeared`);
    return updated;
  }
}
