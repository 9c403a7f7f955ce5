// ─── Enums ───────────────────────────────────────────────────────────────────

export type Role = 'employee' | 'manager' | 'hr';
export type LeaveStatus = 'pending' | 'approved' | 'rejected' | 'cancelled';

export const LEAVE_STATUSES: readonly LeaveStatus[] = ['pending', 'approved', 'rejected', 'cancelled'];

/** Statuses that still hold days against a balance and block overlapping requests. */
export const ACTIVE_STATUSES: readonly LeaveStatus[] = ['pending', 'approved'];

export function isLeaveStatus(value: unknown): value is LeaveStatus {
  return LEAVE_STATUSES.some((status) => status === value);
}

export function isRole(value: unknown): value is Role {
  return value === 'employee' || value === 'manager' || value === 'hr';
}

// ─── Reference Data ──────────────────────────────────────────────────────────

export interface Employee {
  id: string;
  role: Role;
  manager_id: string | null;
}

export interface LeaveTypePolicy {
  leave_type: string;
  max_days: number; // informational, not enforced per request
  min_notice_days: number;
}

// ─── Mutable State ───────────────────────────────────────────────────────────

/** leave_type → remaining days */
export type BalanceMap = Record<string, number>;

export interface LeaveRecord {
  id: number;
  employee: string;
  leave_type: string;
  start_date: string; // YYYY-MM-DD
  end_date: string; // YYYY-MM-DD, inclusive
  status: LeaveStatus;
  approver: string | null; // fixed at creation
}

export type NewLeaveRecord = Omit<LeaveRecord, 'id'>;

export interface Notification {
  id: number;
  recipient: string;
  message: string;
  leave_id: number | null;
  is_read: boolean;
  created_at: Date;
}

// ─── Seed Data ───────────────────────────────────────────────────────────────

export interface ReferenceData {
  employees: Employee[];
  policies: LeaveTypePolicy[];
}

export interface SeedData extends ReferenceData {
  balances: Record<string, BalanceMap>;
  records: LeaveRecord[];
}

// ─── API Request/Response Types ──────────────────────────────────────────────

export interface ApplyLeaveDTO {
  employee: string;
  leave_type: string;
  start_date: string; // ISO date string
  end_date: string;
}

export interface LeaveReportRow {
  employee: string;
  role: Role;
  approved_days: number;
  balance: BalanceMap;
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface LeaveEvent {
  type: 'leave.applied' | 'leave.approved' | 'leave.rejected' | 'leave.cancelled';
  leaveRecord: LeaveRecord;
  actor: string; // who triggered the event
}
