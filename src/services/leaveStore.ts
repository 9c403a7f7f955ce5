import { BalanceMap, LeaveRecord } from '../types';
import { ConnectionPool, withLockedTransaction, withReadSnapshot } from '../config/database';
import { KeyedMutex } from '../utils/keyedMutex';
import { PhaseLock } from '../utils/phaseLock';
import { BalanceLedger, MemoryBalanceLedger, PgBalanceLedger } from './balance.service';
import { LeaveRecordStore, MemoryLeaveRecordStore, PgLeaveRecordStore } from './leaveRecord.service';

export interface LeaveStoreSession {
  ledger: BalanceLedger;
  records: LeaveRecordStore;
}

/** What a query may touch: lookups only. */
export interface LeaveStoreReader {
  ledger: Pick<BalanceLedger, 'read' | 'readAll'>;
  records: Omit<LeaveRecordStore, 'insert' | 'updateStatus'>;
}

/**
 * Owner of all mutable leave state.
 *
 * `runExclusive` is the only way to change state: the callback runs as one
 * unit of work, serialised against every other unit of work for the same
 * employee, and any thrown error discards its changes. `read` only ever sees
 * state between units of work.
 */
export interface LeaveStore {
  runExclusive<T>(employee: string, fn: (session: LeaveStoreSession) => Promise<T>): Promise<T>;
  read<T>(fn: (reader: LeaveStoreReader) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

// ─── In-memory ───────────────────────────────────────────────────────────────

export class MemoryLeaveStore implements LeaveStore {
  private readonly ledger: MemoryBalanceLedger;
  private readonly records: MemoryLeaveRecordStore;
  private readonly mutex = new KeyedMutex();
  private readonly phases = new PhaseLock();

  constructor(initial: { balances?: Record<string, BalanceMap>; records?: LeaveRecord[] } = {}) {
    this.ledger = new MemoryBalanceLedger(initial.balances);
    this.records = new MemoryLeaveRecordStore(initial.records);
  }

  runExclusive<T>(employee: string, fn: (session: LeaveStoreSession) => Promise<T>): Promise<T> {
    // Units of work for different employees share the write phase.
    return this.phases.run('write', () => this.mutex.runExclusive(employee, async () => {
      const balances = this.ledger.snapshot(employee);
      const records = this.records.snapshot(employee);
      try {
        return await fn(this.session());
      } catch (err) {
        this.ledger.restore(employee, balances);
        this.records.restore(employee, records);
        throw err;
      }
    }));
  }

  read<T>(fn: (reader: LeaveStoreReader) => Promise<T>): Promise<T> {
    return this.phases.run('read', () => fn(this.session()));
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private session(): LeaveStoreSession {
    return { ledger: this.ledger, records: this.records };
  }
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

export class PgLeaveStore implements LeaveStore {
  constructor(private readonly pool: ConnectionPool) {}

  runExclusive<T>(employee: string, fn: (session: LeaveStoreSession) => Promise<T>): Promise<T> {
    return withLockedTransaction(this.pool, `employee:${employee}`, (client) =>
      fn({ ledger: new PgBalanceLedger(client), records: new PgLeaveRecordStore(client) })
    );
  }

  read<T>(fn: (reader: LeaveStoreReader) => Promise<T>): Promise<T> {
    return withReadSnapshot(this.pool, (client) =>
      fn({ ledger: new PgBalanceLedger(client), records: new PgLeaveRecordStore(client) })
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
