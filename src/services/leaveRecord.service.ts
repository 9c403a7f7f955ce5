import { LeaveRecord, LeaveStatus, NewLeaveRecord } from '../types';
import { expectRows, isLeaveRecord } from '../types/guards';
import { Queryable } from '../config/database';
import { datesOverlap } from '../utils/helpers';

/**
 * Append-only set of leave records. Status changes in place; nothing is ever
 * deleted, and only the store hands out record ids.
 */
export interface LeaveRecordStore {
  insert(record: NewLeaveRecord): Promise<LeaveRecord>;
  findById(id: number): Promise<LeaveRecord | null>;
  findByEmployee(employee: string, status?: LeaveStatus): Promise<LeaveRecord[]>;
  findPendingByApprover(approver: string): Promise<LeaveRecord[]>;
  allOverlapping(
    employee: string,
    start: string,
    end: string,
    statuses: readonly LeaveStatus[]
  ): Promise<LeaveRecord[]>;
  updateStatus(id: number, status: LeaveStatus): Promise<LeaveRecord | null>;
}

// ─── In-memory ───────────────────────────────────────────────────────────────

export class MemoryLeaveRecordStore implements LeaveRecordStore {
  private records: LeaveRecord[];
  private nextId: number;

  constructor(initial: LeaveRecord[] = []) {
    this.records = [...initial].sort((a, b) => a.id - b.id).map((r) => ({ ...r }));
    this.nextId = this.records.reduce((max, r) => Math.max(max, r.id), 0) + 1;
  }

  async insert(record: NewLeaveRecord): Promise<LeaveRecord> {
    const created: LeaveRecord = { id: this.nextId++, ...record };
    this.records.push(created);
    return { ...created };
  }

  async findById(id: number): Promise<LeaveRecord | null> {
    const found = this.records.find((r) => r.id === id);
    return found ? { ...found } : null;
  }

  async findByEmployee(employee: string, status?: LeaveStatus): Promise<LeaveRecord[]> {
    return this.select((r) => r.employee === employee && (!status || r.status === status));
  }

  async findPendingByApprover(approver: string): Promise<LeaveRecord[]> {
    return this.select((r) => r.approver === approver && r.status === 'pending');
  }

  async allOverlapping(
    employee: string,
    start: string,
    end: string,
    statuses: readonly LeaveStatus[]
  ): Promise<LeaveRecord[]> {
    return this.select((r) =>
      r.employee === employee &&
      statuses.includes(r.status) &&
      datesOverlap(start, end, r.start_date, r.end_date)
    );
  }

  async updateStatus(id: number, status: LeaveStatus): Promise<LeaveRecord | null> {
    const found = this.records.find((r) => r.id === id);
    if (!found) return null;
    found.status = status;
    return { ...found };
  }

  snapshot(employee: string): Map<number, LeaveStatus> {
    return new Map(this.records.filter((r) => r.employee === employee).map((r) => [r.id, r.status]));
  }

  // nextId is left alone so a rolled-back id is never handed out again.
  restore(employee: string, snapshot: Map<number, LeaveStatus>): void {
    this.records = this.records.filter((r) => r.employee !== employee || snapshot.has(r.id));
    for (const record of this.records) {
      const status = snapshot.get(record.id);
      if (status) record.status = status;
    }
  }

  private select(predicate: (record: LeaveRecord) => boolean): LeaveRecord[] {
    return this.records.filter(predicate).map((r) => ({ ...r }));
  }
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

function toRecords(rows: unknown[]): LeaveRecord[] {
  return expectRows(rows, isLeaveRecord, 'leave_records');
}

const RECORD_COLUMNS = `id, employee_id AS employee, leave_type, start_date, end_date,
  status, approver_id AS approver`;

export class PgLeaveRecordStore implements LeaveRecordStore {
  constructor(private readonly client: Queryable) {}

  async insert(record: NewLeaveRecord): Promise<LeaveRecord> {
    const result = await this.client.query(
      `INSERT INTO leave_records (employee_id, leave_type, start_date, end_date, status, approver_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${RECORD_COLUMNS}`,
      [record.employee, record.leave_type, record.start_date, record.end_date, record.status, record.approver]
    );
    const created = toRecords(result.rows)[0];
    if (!created) throw new Error('Leave record insert returned no row');
    return created;
  }

  async findById(id: number): Promise<LeaveRecord | null> {
    const result = await this.client.query(
      `SELECT ${RECORD_COLUMNS} FROM leave_records WHERE id = $1`,
      [id]
    );
    return toRecords(result.rows)[0] ?? null;
  }

  async findByEmployee(employee: string, status?: LeaveStatus): Promise<LeaveRecord[]> {
    const result = status
      ? await this.client.query(
        `SELECT ${RECORD_COLUMNS} FROM leave_records WHERE employee_id = $1 AND status = $2 ORDER BY id`,
        [employee, status]
      )
      : await this.client.query(
        `SELECT ${RECORD_COLUMNS} FROM leave_records WHERE employee_id = $1 ORDER BY id`,
        [employee]
      );
    return toRecords(result.rows);
  }

  async findPendingByApprover(approver: string): Promise<LeaveRecord[]> {
    const result = await this.client.query(
      `SELECT ${RECORD_COLUMNS} FROM leave_records
       WHERE approver_id = $1 AND status = 'pending'
       ORDER BY id`,
      [approver]
    );
    return toRecords(result.rows);
  }

  async allOverlapping(
    employee: string,
    start: string,
    end: string,
    statuses: readonly LeaveStatus[]
  ): Promise<LeaveRecord[]> {
    const result = await this.client.query(
      `SELECT ${RECORD_COLUMNS} FROM leave_records
       WHERE employee_id = $1
         AND status = ANY($4)
         AND start_date <= $3
         AND end_date >= $2
       ORDER BY id`,
      [employee, start, end, [...statuses]]
    );
    return toRecords(result.rows);
  }

  async updateStatus(id: number, status: LeaveStatus): Promise<LeaveRecord | null> {
    const result = await this.client.query(
      `UPDATE leave_records SET status = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${RECORD_COLUMNS}`,
      [id, status]
    );
    return toRecords(result.rows)[0] ?? null;
  }
}
