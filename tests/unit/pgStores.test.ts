import { describe, it, expect, vi } from 'vitest';
import { PgBalanceLedger } from '../../src/services/balance.service';
import { PgLeaveRecordStore } from '../../src/services/leaveRecord.service';
import { PgNotificationInbox } from '../../src/services/notification.service';
import { loadReferenceData } from '../../src/db/loader';

function fakeClient(rows: unknown[] = [], rowCount: number | null = rows.length) {
  return { query: vi.fn(async (_text: string, _values?: unknown[]) => ({ rows, rowCount })) };
}

const row = {
  id: 5,
  employee: 'alice',
  leave_type: 'annual',
  start_date: '2025-07-10',
  end_date: '2025-07-11',
  status: 'pending',
  approver: 'david',
};

describe('PgLeaveRecordStore', () => {
  it('returns a narrowed record', async () => {
    const client = fakeClient([row]);
    const store = new PgLeaveRecordStore(client);

    expect(await store.findById(5)).toEqual(row);
    expect(client.query.mock.calls[0]?.[1]).toEqual([5]);
  });

  it('returns null when no row matches', async () => {
    expect(await new PgLeaveRecordStore(fakeClient()).findById(5)).toBeNull();
  });

  it('fails on a row that does not look like a leave record', async () => {
    const store = new PgLeaveRecordStore(fakeClient([{ ...row, status: 'archived' }]));
    await expect(store.findById(5)).rejects.toThrow('Malformed leave_records row at index 0');
  });

  it('passes the statuses of an overlap scan as an array parameter', async () => {
    const client = fakeClient();
    await new PgLeaveRecordStore(client).allOverlapping('alice', '2025-07-01', '2025-07-03', ['pending', 'approved']);

    expect(client.query.mock.calls[0]?.[1]).toEqual(['alice', '2025-07-01', '2025-07-03', ['pending', 'approved']]);
  });

  it('filters by status only when one is given', async () => {
    const client = fakeClient();
    const store = new PgLeaveRecordStore(client);
    await store.findByEmployee('alice');
    await store.findByEmployee('alice', 'approved');

    expect(client.query.mock.calls.map(([, values]) => values)).toEqual([['alice'], ['alice', 'approved']]);
  });
});

describe('PgBalanceLedger', () => {
  it('reads a missing balance as zero', async () => {
    expect(await new PgBalanceLedger(fakeClient()).read('alice', 'unpaid')).toBe(0);
  });

  it('folds balance rows into a map', async () => {
    const ledger = new PgBalanceLedger(fakeClient([
      { leave_type: 'annual', days: 7 },
      { leave_type: 'sick', days: 3 },
    ]));
    expect(await ledger.readAll('alice')).toEqual({ annual: 7, sick: 3 });
  });

  it('refuses to debit a balance row that does not exist', async () => {
    const ledger = new PgBalanceLedger(fakeClient([], 0));
    await expect(ledger.debit('alice', 'unpaid', 1)).rejects.toThrow('No balance record found for alice, unpaid');
  });

  it('credits through an upsert', async () => {
    const client = fakeClient([], 1);
    await new PgBalanceLedger(client).credit('alice', 'annual', 2);

    expect(client.query.mock.calls[0]?.[0]).toContain('ON CONFLICT (employee_id, leave_type)');
    expect(client.query.mock.calls[0]?.[1]).toEqual(['alice', 'annual', 2]);
  });
});

describe('PgNotificationInbox', () => {
  it('stores a message with its leave id', async () => {
    const client = fakeClient([], 1);
    await new PgNotificationInbox(client).notify('david', 'hello', 3);

    expect(client.query.mock.calls[0]?.[1]).toEqual(['david', 'hello', 3]);
  });

  it('adds the unread filter on request', async () => {
    const createdAt = new Date('2025-06-20T09:00:00Z');
    const client = fakeClient([
      { id: 1, recipient: 'david', message: 'hello', leave_id: 3, is_read: false, created_at: createdAt },
    ]);
    const inbox = await new PgNotificationInbox(client).getNotifications('david', true);

    expect(client.query.mock.calls[0]?.[0]).toBe(
      'SELECT id, recipient_id AS recipient, message, leave_id, is_read, created_at FROM notifications ' +
      'WHERE recipient_id = $1 AND is_read = FALSE ORDER BY id DESC'
    );
    expect(inbox).toEqual([
      { id: 1, recipient: 'david', message: 'hello', leave_id: 3, is_read: false, created_at: createdAt },
    ]);
  });

  it('reports whether a notification was marked', async () => {
    expect(await new PgNotificationInbox(fakeClient([], 0)).markAsRead(9)).toBe(false);
    expect(await new PgNotificationInbox(fakeClient([], 1)).markAsRead(9)).toBe(true);
  });
});

describe('loadReferenceData', () => {
  it('narrows employee and policy rows', async () => {
    const client = {
      query: vi.fn(async (text: string) => ({
        rows: text.includes('FROM employees')
          ? [{ id: 'farah', role: 'hr', manager_id: null }]
          : [{ leave_type: 'annual', max_days: 30, min_notice_days: 2 }],
        rowCount: 1,
      })),
    };

    expect(await loadReferenceData(client)).toEqual({
      employees: [{ id: 'farah', role: 'hr', manager_id: null }],
      policies: [{ leave_type: 'annual', max_days: 30, min_notice_days: 2 }],
    });
  });

  it('fails on an employee with an unknown role', async () => {
    const client = {
      query: vi.fn(async () => ({ rows: [{ id: 'zoe', role: 'intern', manager_id: null }], rowCount: 1 })),
    };
    await expect(loadReferenceData(client)).rejects.toThrow('Malformed employees row at index 0');
  });
});
