import fs from 'fs';
import { BalanceMap, ReferenceData, SeedData } from '../types';
import {
  expectRows,
  isBalanceMap,
  isEmployee,
  isLeaveRecord,
  isLeaveTypePolicy,
  isObject,
} from '../types/guards';
import { Queryable } from '../config/database';

/*
  Startup data loading.
  - Seed file (JSON): employees, leave-type policies, opening balances, historical records.
  - PostgreSQL: employees and policies from their tables; balances and records
    stay in the database and are read through the store.
*/

// ─── Seed file ───────────────────────────────────────────────────────────────

/**
 * Validate parsed seed JSON. Throws naming the first offending entry.
 */
export function parseSeedData(raw: unknown): SeedData {
  if (!isObject(raw)) throw new Error('Seed data must be a JSON object');

  const employees = requireArray(raw.employees, 'employees', isEmployee);
  const policies = requireArray(raw.policies, 'policies', isLeaveTypePolicy);
  const records = requireArray(raw.records ?? [], 'records', isLeaveRecord);

  const balancesRaw = raw.balances ?? {};
  if (!isObject(balancesRaw)) throw new Error('Seed data "balances" must be an object');
  const balances: Record<string, BalanceMap> = {};
  for (const [employee, byType] of Object.entries(balancesRaw)) {
    if (!isBalanceMap(byType)) {
      throw new Error(`Seed data "balances.${employee}" must map leave types to non-negative integers`);
    }
    balances[employee] = byType;
  }

  const employeeIds = new Set(employees.map((e) => e.id));
  for (const e of employees) {
    if (e.manager_id !== null && !employeeIds.has(e.manager_id)) {
      throw new Error(`Employee "${e.id}" reports to unknown manager "${e.manager_id}"`);
    }
  }
  const recordIds = new Set<number>();
  for (const r of records) {
    if (recordIds.has(r.id)) throw new Error(`Duplicate leave record id ${r.id}`);
    recordIds.add(r.id);
  }

  return { employees, policies, balances, records };
}

export function readSeedFile(filePath: string): SeedData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseSeedData(raw);
}

function requireArray<T>(value: unknown, name: string, guard: (item: unknown) => item is T): T[] {
  if (!Array.isArray(value)) throw new Error(`Seed data "${name}" must be an array`);
  return value.map((item: unknown, index) => {
    if (!guard(item)) throw new Error(`Seed data "${name}[${index}]" is malformed`);
    return item;
  });
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

export async function loadReferenceData(pool: Queryable): Promise<ReferenceData> {
  const employees = await pool.query('SELECT id, role, manager_id FROM employees ORDER BY id');
  const policies = await pool.query(
    'SELECT id AS leave_type, max_days, min_notice_days FROM leave_types ORDER BY id'
  );
  return {
    employees: expectRows(employees.rows, isEmployee, 'employees'),
    policies: expectRows(policies.rows, isLeaveTypePolicy, 'leave_types'),
  };
}
