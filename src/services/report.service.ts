import { BalanceMap, LeaveRecord, LeaveReportRow, LeaveStatus } from '../types';
import { Directory } from './employee.service';
import { LeaveStore } from './leaveStore';
import { recordDuration } from './leave.service';

/**
 * Read-only projections over the directory and the leave store. Nothing is
 * cached; every call reads current state.
 */
export class ReportService {
  constructor(
    private readonly directory: Directory,
    private readonly store: LeaveStore
  ) {}

  getLeaveBalance(employee: string): Promise<BalanceMap> {
    return this.store.read(({ ledger }) => ledger.readAll(employee));
  }

  listLeaveRecords(employee: string): Promise<LeaveRecord[]> {
    return this.store.read(({ records }) => records.findByEmployee(employee));
  }

  getFilteredLeaveRecords(employee: string, status?: LeaveStatus): Promise<LeaveRecord[]> {
    return this.store.read(({ records }) => records.findByEmployee(employee, status));
  }

  getLeaveRecord(id: number): Promise<LeaveRecord | null> {
    return this.store.read(({ records }) => records.findById(id));
  }

  getPendingApprovals(manager: string): Promise<LeaveRecord[]> {
    return this.store.read(({ records }) => records.findPendingByApprover(manager));
  }

  /**
   * Approved days taken and remaining balance for every employee in the directory.
   */
  leaveReport(): Promise<LeaveReportRow[]> {
    return this.store.read(async ({ ledger, records }) => {
      const rows: LeaveReportRow[] = [];
      for (const employee of this.directory.getAllEmployees()) {
        const approved = await records.findByEmployee(employee.id, 'approved');
        rows.push({
          employee: employee.id,
          role: employee.role,
          approved_days: approved.reduce((sum, r) => sum + recordDuration(r), 0),
          balance: await ledger.readAll(employee.id),
        });
      }
      return rows;
    });
  }
}
