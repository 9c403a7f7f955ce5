import { AppConfig } from './config/env';
import { createPool } from './config/database';
import { LeaveEventBus } from './events/emitter';
import { registerAllHandlers } from './events/register';
import { loadReferenceData, readSeedFile } from './db/loader';
import { Directory } from './services/employee.service';
import { PolicyStore } from './services/policy.service';
import { LeaveStore, MemoryLeaveStore, PgLeaveStore } from './services/leaveStore';
import { LeaveService } from './services/leave.service';
import { ReportService } from './services/report.service';
import {
  MemoryNotificationInbox,
  NotificationInbox,
  PgNotificationInbox,
} from './services/notification.service';
import { Clock, systemClock } from './utils/clock';
import { ReferenceData, SeedData } from './types';

export interface AppContext {
  directory: Directory;
  policies: PolicyStore;
  store: LeaveStore;
  notifications: NotificationInbox;
  events: LeaveEventBus;
  leaveService: LeaveService;
  reportService: ReportService;
  /** Wait for in-flight notifications, then release the store. */
  close(): Promise<void>;
}

export interface ContextParts {
  reference: ReferenceData;
  store: LeaveStore;
  notifications: NotificationInbox;
  clock?: Clock;
}

export function buildContext({ reference, store, notifications, clock = systemClock }: ContextParts): AppContext {
  const directory = new Directory(reference.employees);
  const policies = new PolicyStore(reference.policies);
  const events = new LeaveEventBus();
  registerAllHandlers(events, notifications);

  return {
    directory,
    policies,
    store,
    notifications,
    events,
    leaveService: new LeaveService({ directory, policies, store, clock, events }),
    reportService: new ReportService(directory, store),
    async close() {
      await events.settled();
      await store.close();
    },
  };
}

/**
 * Everything in process memory, starting from the given seed.
 */
export function createMemoryContext(seed: SeedData, clock?: Clock): AppContext {
  return buildContext({
    reference: seed,
    store: new MemoryLeaveStore({ balances: seed.balances, records: seed.records }),
    notifications: new MemoryNotificationInbox(),
    clock,
  });
}

export async function createContext(config: AppConfig, clock?: Clock): Promise<AppContext> {
  if (config.storeDriver === 'postgres') {
    const pool = createPool(config.db);
    let reference: ReferenceData;
    try {
      reference = await loadReferenceData(pool);
    } catch (err) {
      await pool.end();
      throw err;
    }
    console.log(
      `[Container] Loaded ${reference.employees.length} employees and ${reference.policies.length} leave types from PostgreSQL`
    );
    return buildContext({
      reference,
      store: new PgLeaveStore(pool),
      notifications: new PgNotificationInbox(pool),
      clock,
    });
  }

  const seed = readSeedFile(config.seedFile);
  console.log(`[Container] Loaded seed file ${config.seedFile} into memory store`);
  return createMemoryContext(seed, clock);
}
