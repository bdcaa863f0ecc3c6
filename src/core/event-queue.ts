import { CascadeLimitError } from './errors.js';

/**
 * An action waiting on the simulated clock.
 */
export interface ScheduledEvent {
  /** Submission-order id, also the tie-breaker */
  id: number;
  /** Simulated time (ms) the event fires at */
  fireAt: number;
  /** Short description for logs */
  label: string;
  action: () => void;
}

/**
 * A repeating callback driven by some clock.
 */
export interface Timer {
  start(): void;
  stop(): void;
}

/**
 * Builds a timer that calls `onFire` every `intervalMs`.
 * Injected wherever a component needs periodic behaviour, so tests
 * can substitute a hand-driven timer.
 */
export type TimerFactory = (intervalMs: number, onFire: () => void) => Timer;

/**
 * Deterministic simulated-time event queue.
 *
 * Events fire in fire-time order; events due at the same time fire in
 * submission order. Scheduled events cannot be cancelled. Time only
 * moves when the queue is stepped or advanced.
 */
export class SimulationEventQueue {
  private readonly events: ScheduledEvent[] = [];
  private currentTime = 0;
  private nextId = 1;

  /**
   * Current simulated time in ms.
   */
  now(): number {
    return this.currentTime;
  }

  /**
   * Schedule an action `delayMs` after the current time.
   * Returns the event id.
   */
  schedule(delayMs: number, action: () => void, label = 'event'): number {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RangeError(`Invalid delay: ${String(delayMs)}`);
    }

    const event: ScheduledEvent = {
      id: this.nextId++,
      fireAt: this.currentTime + delayMs,
      label,
      action,
    };
    this.events.splice(this.insertionIndex(event.fireAt), 0, event);
    return event.id;
  }

  size(): number {
    return this.events.length;
  }

  peek(): ScheduledEvent | null {
    return this.events[0] ?? null;
  }

  /**
   * Fire the next event. Returns false when the queue is empty.
   */
  step(): boolean {
    const event = this.events.shift();
    if (!event) {
      return false;
    }
    this.currentTime = Math.max(this.currentTime, event.fireAt);
    event.action();
    return true;
  }

  /**
   * Fire every event due up to and including `time`, including ones
   * scheduled by the events themselves, then move the clock to `time`.
   * Returns the number of events fired.
   */
  advanceTo(time: number): number {
    let fired = 0;
    let next = this.peek();
    while (next && next.fireAt <= time) {
      this.step();
      fired++;
      next = this.peek();
    }
    this.currentTime = Math.max(this.currentTime, time);
    return fired;
  }

  advanceBy(ms: number): number {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Invalid duration: ${String(ms)}`);
    }
    return this.advanceTo(this.currentTime + ms);
  }

  /**
   * Fire events until the queue is empty.
   * Throws CascadeLimitError once more than `maxEvents` have fired.
   */
  runUntilIdle(maxEvents: number): number {
    let fired = 0;
    while (this.size() > 0) {
      if (fired >= maxEvents) {
        throw new CascadeLimitError(maxEvents, 'events');
      }
      this.step();
      fired++;
    }
    return fired;
  }

  /**
   * Drop all pending events. The clock keeps its time.
   */
  clear(): void {
    this.events.length = 0;
  }

  /**
   * Index after the last event due at or before `fireAt`.
   */
  private insertionIndex(fireAt: number): number {
    let low = 0;
    let high = this.events.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const event = this.events[mid];
      if (event && event.fireAt <= fireAt) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}

/**
 * Create a simulated-time event queue.
 */
export function createEventQueue(): SimulationEventQueue {
  return new SimulationEventQueue();
}

/**
 * Timer factory backed by the simulated clock. Each firing re-arms the
 * timer; stop() turns firings that are already queued into no-ops.
 */
export function createClockTimer(queue: SimulationEventQueue): TimerFactory {
  return (intervalMs, onFire) => {
    let generation = 0;
    let running = false;

    const arm = (armedGeneration: number): void => {
      queue.schedule(
        intervalMs,
        () => {
          if (!running || armedGeneration !== generation) return;
          onFire();
          arm(armedGeneration);
        },
        'timer'
      );
    };

    return {
      start(): void {
        if (running) return;
        running = true;
        generation++;
        arm(generation);
      },
      stop(): void {
        running = false;
      },
    };
  };
}
