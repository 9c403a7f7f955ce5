import { describe, it, expect, vi } from 'vitest';
import { LeaveEventBus } from '../../src/events/emitter';
import { LeaveEvent } from '../../src/types';

const event: LeaveEvent = {
  type: 'leave.approved',
  actor: 'david',
  leaveRecord: {
    id: 7,
    employee: 'alice',
    leave_type: 'annual',
    start_date: '2025-07-10',
    end_date: '2025-07-11',
    status: 'approved',
    approver: 'david',
  },
};

describe('LeaveEventBus', () => {
  it('runs handlers after the emitting call returns', async () => {
    const bus = new LeaveEventBus();
    const handler = vi.fn(async () => undefined);
    bus.onLeaveEvent('leave.approved', handler);

    bus.emitLeaveEvent(event);
    expect(handler).not.toHaveBeenCalled();

    await bus.settled();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('only delivers to handlers of the emitted type', async () => {
    const bus = new LeaveEventBus();
    const handler = vi.fn(async () => undefined);
    bus.onLeaveEvent('leave.rejected', handler);

    bus.emitLeaveEvent(event);
    await bus.settled();

    expect(handler).not.toHaveBeenCalled();
  });

  it('isolates a failing handler from the others', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const bus = new LeaveEventBus();
    const healthy = vi.fn(async () => undefined);
    bus.onLeaveEvent('leave.approved', async () => {
      throw new Error('inbox full');
    });
    bus.onLeaveEvent('leave.approved', healthy);

    bus.emitLeaveEvent(event);
    await bus.settled();

    expect(healthy).toHaveBeenCalledOnce();
    expect(errorSpy).toHaveBeenCalledWith(
      '[EventBus] Handler failed for leave.approved on leave #7:',
      'inbox full'
    );
  });

  it('settled resolves at once with nothing in flight', async () => {
    await expect(new LeaveEventBus().settled()).resolves.toBeUndefined();
  });
});
