import { SeedData } from '../src/types';
import { AppContext, createMemoryContext } from '../src/container';
import { fixedClock } from '../src/utils/clock';

export const TODAY = '2025-06-20';

/**
 * Small org: david manages alice, bob and charlie and reports to farah, who
 * reports to nobody. `unpaid` exists as a policy but nobody holds a balance.
 */
export function buildSeed(): SeedData {
  return {
    employees: [
      { id: 'alice', role: 'employee', manager_id: 'david' },
      { id: 'bob', role: 'employee', manager_id: 'david' },
      { id: 'charlie', role: 'employee', manager_id: 'david' },
      { id: 'david', role: 'manager', manager_id: 'farah' },
      { id: 'farah', role: 'hr', manager_id: null },
    ],
    policies: [
      { leave_type: 'annual', max_days: 30, min_notice_days: 2 },
      { leave_type: 'sick', max_days: 15, min_notice_days: 0 },
      { leave_type: 'casual', max_days: 7, min_notice_days: 0 },
      { leave_type: 'unpaid', max_days: 10, min_notice_days: 0 },
    ],
    balances: {
      alice: { annual: 10, sick: 5, casual: 3 },
      bob: { annual: 5, sick: 5, casual: 3 },
      charlie: { annual: 8, sick: 5, casual: 1 },
      david: { annual: 12, sick: 5, casual: 3 },
      farah: { annual: 20, sick: 5, casual: 3 },
    },
    records: [
      {
        id: 1, employee: 'alice', leave_type: 'annual',
        start_date: '2025-07-01', end_date: '2025-07-03', status: 'approved', approver: 'david',
      },
      {
        id: 2, employee: 'charlie', leave_type: 'sick',
        start_date: '2025-07-05', end_date: '2025-07-06', status: 'pending', approver: 'david',
      },
    ],
  };
}

export function buildContext(): AppContext {
  return createMemoryContext(buildSeed(), fixedClock(TODAY));
}
