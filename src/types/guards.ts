/**
 * Runtime type guards for data crossing a boundary: the seed file and rows
 * read back from PostgreSQL.
 */

import {
  BalanceMap,
  Employee,
  isLeaveStatus,
  isRole,
  LeaveRecord,
  LeaveTypePolicy,
  Notification,
} from './index';
import { isIsoDate } from '../utils/helpers';

export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function isEmployee(value: unknown): value is Employee {
  if (!isObject(value)) return false;
  return (
    typeof value.id === 'string' &&
    value.id.length > 0 &&
    isRole(value.role) &&
    (value.manager_id === null || typeof value.manager_id === 'string')
  );
}

export function isLeaveTypePolicy(value: unknown): value is LeaveTypePolicy {
  if (!isObject(value)) return false;
  return (
    typeof value.leave_type === 'string' &&
    value.leave_type.length > 0 &&
    isNonNegativeInteger(value.max_days) &&
    isNonNegativeInteger(value.min_notice_days)
  );
}

export function isLeaveRecord(value: unknown): value is LeaveRecord {
  if (!isObject(value)) return false;
  const { id, employee, leave_type, start_date, end_date, status, approver } = value;
  return (
    typeof id === 'number' &&
    Number.isInteger(id) &&
    id > 0 &&
    typeof employee === 'string' &&
    typeof leave_type === 'string' &&
    isIsoDate(start_date) &&
    isIsoDate(end_date) &&
    start_date <= end_date &&
    isLeaveStatus(status) &&
    (approver === null || typeof approver === 'string')
  );
}

export function isBalanceMap(value: unknown): value is BalanceMap {
  return isObject(value) && Object.values(value).every(isNonNegativeInteger);
}

export function isNotification(value: unknown): value is Notification {
  if (!isObject(value)) return false;
  return (
    typeof value.id === 'number' &&
    typeof value.recipient === 'string' &&
    typeof value.message === 'string' &&
    (value.leave_id === null || typeof value.leave_id === 'number') &&
    typeof value.is_read === 'boolean' &&
    value.created_at instanceof Date
  );
}

/**
 * Narrow every row with `guard`, failing loudly on the first one that does not fit.
 */
export function expectRows<T>(rows: unknown[], guard: (row: unknown) => row is T, what: string): T[] {
  return rows.map((row, index) => {
    if (!guard(row)) throw new Error(`Malformed ${what} row at index ${index}`);
    return row;
  });
}
