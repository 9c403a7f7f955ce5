import { SeedData } from '../types';
import { loadConfig } from '../config/env';
import { ConnectionPool, createPool } from '../config/database';
import { readSeedFile } from './loader';

/*
  Load the seed file into PostgreSQL, replacing whatever is there:
  - employees (managers before their reports)
  - leave types with their policies
  - opening balances
  - historical leave records, keeping their ids; the id sequence continues after the highest
*/

export async function seedDatabase(pool: ConnectionPool, seed: SeedData): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');

    // ── Clear existing data ──────────────────────────────────────────────────
    // TRUNCATE bypasses the no-delete rule on leave_records.
    await client.query(
      'TRUNCATE notifications, leave_records, leave_balances, leave_types, employees RESTART IDENTITY CASCADE'
    );

    // ── Employees ────────────────────────────────────────────────────────────
    for (const e of seed.employees) {
      await client.query('INSERT INTO employees (id, role) VALUES ($1, $2)', [e.id, e.role]);
    }
    for (const e of seed.employees) {
      if (e.manager_id) {
        await client.query('UPDATE employees SET manager_id = $2 WHERE id = $1', [e.id, e.manager_id]);
      }
    }

    // ── Leave types ──────────────────────────────────────────────────────────
    for (const p of seed.policies) {
      await client.query(
        'INSERT INTO leave_types (id, max_days, min_notice_days) VALUES ($1, $2, $3)',
        [p.leave_type, p.max_days, p.min_notice_days]
      );
    }

    // ── Balances ─────────────────────────────────────────────────────────────
    for (const [employee, byType] of Object.entries(seed.balances)) {
      for (const [leaveType, days] of Object.entries(byType)) {
        await client.query(
          'INSERT INTO leave_balances (employee_id, leave_type, days) VALUES ($1, $2, $3)',
          [employee, leaveType, days]
        );
      }
    }

    // ── Leave records ────────────────────────────────────────────────────────
    for (const r of seed.records) {
      await client.query(
        `INSERT INTO leave_records (id, employee_id, leave_type, start_date, end_date, status, approver_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [r.id, r.employee, r.leave_type, r.start_date, r.end_date, r.status, r.approver]
      );
    }
    await client.query(
      "SELECT setval(pg_get_serial_sequence('leave_records', 'id'), COALESCE((SELECT MAX(id) FROM leave_records), 0) + 1, false)"
    );

    await client.query('COMMIT');
    console.log('[Seed] ✓ Seed data inserted successfully');
    console.log(`[Seed]   - ${seed.employees.length} employees`);
    console.log(`[Seed]   - ${seed.policies.length} leave types`);
    console.log(`[Seed]   - ${seed.records.length} leave records`);
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

async function main() {
  const config = loadConfig();
  const pool = createPool(config.db);
  try {
    await seedDatabase(pool, readSeedFile(config.seedFile));
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[Seed] Seed failed:', err);
    process.exitCode = 1;
  });
}
