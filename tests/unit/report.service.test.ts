import { describe, it, expect, beforeEach } from 'vitest';
import { AppContext } from '../../src/container';
import { buildContext } from '../fixtures';

describe('ReportService', () => {
  let ctx: AppContext;

  beforeEach(() => {
    ctx = buildContext();
  });

  it('returns an empty balance map for an unknown employee', async () => {
    expect(await ctx.reportService.getLeaveBalance('zoe')).toEqual({});
  });

  it('lists every record of an employee in id order', async () => {
    await ctx.leaveService.applyLeave({
      employee: 'alice', leave_type: 'sick', start_date: '2025-06-25', end_date: '2025-06-25',
    });
    const records = await ctx.reportService.listLeaveRecords('alice');
    expect(records.map((r) => r.id)).toEqual([1, 3]);
  });

  it('filters records by status', async () => {
    expect((await ctx.reportService.getFilteredLeaveRecords('alice', 'approved')).map((r) => r.id)).toEqual([1]);
    expect(await ctx.reportService.getFilteredLeaveRecords('alice', 'pending')).toEqual([]);
  });

  it('returns null for an unknown record', async () => {
    expect(await ctx.reportService.getLeaveRecord(404)).toBeNull();
  });

  it('lists pending requests waiting on a manager', async () => {
    const pending = await ctx.reportService.getPendingApprovals('david');
    expect(pending.map((r) => r.id)).toEqual([2]);
    expect(await ctx.reportService.getPendingApprovals('farah')).toEqual([]);
  });

  it('drops a request from the pending list once decided', async () => {
    await ctx.leaveService.processLeave('david', 2, true);
    expect(await ctx.reportService.getPendingApprovals('david')).toEqual([]);
  });

  it('reports approved days and balances for every employee', async () => {
    await ctx.leaveService.processLeave('david', 2, true);

    expect(await ctx.reportService.leaveReport()).toEqual([
      { employee: 'alice', role: 'employee', approved_days: 3, balance: { annual: 10, sick: 5, casual: 3 } },
      { employee: 'bob', role: 'employee', approved_days: 0, balance: { annual: 5, sick: 5, casual: 3 } },
      { employee: 'charlie', role: 'employee', approved_days: 2, balance: { annual: 8, sick: 5, casual: 1 } },
      { employee: 'david', role: 'manager', approved_days: 0, balance: { annual: 12, sick: 5, casual: 3 } },
      { employee: 'farah', role: 'hr', approved_days: 0, balance: { annual: 20, sick: 5, casual: 3 } },
    ]);
  });
});
