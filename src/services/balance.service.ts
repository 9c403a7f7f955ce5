import { BalanceMap } from '../types';
import { expectRows, isNonNegativeInteger, isObject } from '../types/guards';
import { Queryable } from '../config/database';

/**
 * Per-employee, per-leave-type remaining-day counters.
 *
 * The ledger does no validation of its own: the lifecycle engine checks the
 * balance before it debits.
 */
export interface BalanceLedger {
  read(employee: string, leaveType: string): Promise<number>;
  readAll(employee: string): Promise<BalanceMap>;
  debit(employee: string, leaveType: string, days: number): Promise<void>;
  credit(employee: string, leaveType: string, days: number): Promise<void>;
}

// ─── In-memory ───────────────────────────────────────────────────────────────

export class MemoryBalanceLedger implements BalanceLedger {
  private readonly balances = new Map<string, Map<string, number>>();

  constructor(initial: Record<string, BalanceMap> = {}) {
    for (const [employee, byType] of Object.entries(initial)) {
      this.balances.set(employee, new Map(Object.entries(byType)));
    }
  }

  async read(employee: string, leaveType: string): Promise<number> {
    return this.balances.get(employee)?.get(leaveType) ?? 0;
  }

  async readAll(employee: string): Promise<BalanceMap> {
    return Object.fromEntries(this.balances.get(employee) ?? []);
  }

  async debit(employee: string, leaveType: string, days: number): Promise<void> {
    this.adjust(employee, leaveType, -days);
  }

  async credit(employee: string, leaveType: string, days: number): Promise<void> {
    this.adjust(employee, leaveType, days);
  }

  snapshot(employee: string): BalanceMap {
    return Object.fromEntries(this.balances.get(employee) ?? []);
  }

  restore(employee: string, snapshot: BalanceMap): void {
    this.balances.set(employee, new Map(Object.entries(snapshot)));
  }

  private adjust(employee: string, leaveType: string, delta: number): void {
    let byType = this.balances.get(employee);
    if (!byType) {
      byType = new Map();
      this.balances.set(employee, byType);
    }
    byType.set(leaveType, (byType.get(leaveType) ?? 0) + delta);
  }
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

interface BalanceRow {
  leave_type: string;
  days: number;
}

function isBalanceRow(value: unknown): value is BalanceRow {
  return isObject(value) && typeof value.leave_type === 'string' && isNonNegativeInteger(value.days);
}

export class PgBalanceLedger implements BalanceLedger {
  constructor(private readonly client: Queryable) {}

  async read(employee: string, leaveType: string): Promise<number> {
    const result = await this.client.query(
      'SELECT leave_type, days FROM leave_balances WHERE employee_id = $1 AND leave_type = $2',
      [employee, leaveType]
    );
    return expectRows(result.rows, isBalanceRow, 'leave_balances')[0]?.days ?? 0;
  }

  async readAll(employee: string): Promise<BalanceMap> {
    const result = await this.client.query(
      'SELECT leave_type, days FROM leave_balances WHERE employee_id = $1 ORDER BY leave_type',
      [employee]
    );
    const rows = expectRows(result.rows, isBalanceRow, 'leave_balances');
    return Object.fromEntries(rows.map((row) => [row.leave_type, row.days]));
  }

  async debit(employee: string, leaveType: string, days: number): Promise<void> {
    const result = await this.client.query(
      `UPDATE leave_balances
       SET days = days - $3
       WHERE employee_id = $1 AND leave_type = $2`,
      [employee, leaveType, days]
    );
    if (result.rowCount === 0) {
      throw new Error(`No balance record found for ${employee}, ${leaveType}`);
    }
  }

  async credit(employee: string, leaveType: string, days: number): Promise<void> {
    await this.client.query(
      `INSERT INTO leave_balances (employee_id, leave_type, days)
       VALUES ($1, $2, $3)
       ON CONFLICT (employee_id, leave_type)
       DO UPDATE SET days = leave_balances.days + EXCLUDED.days`,
      [employee, leaveType, days]
    );
  }
}
