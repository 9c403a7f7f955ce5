import { EventEmitter } from 'events';
import { LeaveEvent } from '../types';

/**
 * Event bus for leave lifecycle events.
 *
 * - Events are emitted only after a state change has been committed.
 * - Handlers run asynchronously and never block the operation that emitted.
 * - Each handler catches its own errors: a failing notification is logged,
 *   the committed transition stands, and other handlers still run.
 */
export class LeaveEventBus extends EventEmitter {
  private readonly inFlight = new Set<Promise<void>>();

  emitLeaveEvent(event: LeaveEvent) {
    console.log(`[EventBus] Emitting ${event.type} for leave #${event.leaveRecord.id}`);
    this.emit(event.type, event);
  }

  /**
   * Register a handler that runs asynchronously and catches its own errors.
   */
  onLeaveEvent(eventType: LeaveEvent['type'], handler: (event: LeaveEvent) => Promise<void>) {
    this.on(eventType, (event: LeaveEvent) => {
      const run = Promise.resolve()
        .then(() => handler(event))
        .catch((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          console.error(
            `[EventBus] Handler failed for ${eventType} on leave #${event.leaveRecord.id}:`,
            message
          );
        })
        .finally(() => {
          this.inFlight.delete(run);
        });
      this.inFlight.add(run);
    });
  }

  /**
   * Wait for every handler run started so far. Used on shutdown and in tests.
   */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
