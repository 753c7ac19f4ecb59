import type { PoolEvent } from "@stakewell/types";
import type { BlockClock, EventSink, Host } from "../host";
import { MemoryLedger } from "./ledger";
import { MemoryValidator } from "./validator";

export class MemoryClock implements BlockClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export class MemoryEventLog implements EventSink {
  events: PoolEvent[] = [];

  emit(event: PoolEvent): void {
    this.events.push(event);
  }

  ofType<K extends PoolEvent["type"]>(type: K): Extract<PoolEvent, { type: K }>[] {
    return this.events.filter((e): e is Extract<PoolEvent, { type: K }> => e.type === type);
  }
}

/**
 * In-process host: ledger, validator, clock and event log, with
 * snapshot/restore for all-or-nothing execution.
 */
export class MemoryHost implements Host {
  readonly clock: MemoryClock;
  readonly ledger = new MemoryLedger();
  readonly validator: MemoryValidator;
  readonly events = new MemoryEventLog();

  constructor(startTime = 1_700_000_000) {
    this.clock = new MemoryClock(startTime);
    this.validator = new MemoryValidator(this.ledger, this.clock);
  }

  atomically<T>(operation: () => T): T {
    const ledger = this.ledger.snapshot();
    const validator = this.validator.snapshot();
    const eventCount = this.events.events.length;
    try {
      return operation();
    } catch (err) {
      this.ledger.restore(ledger);
      this.validator.restore(validator);
      this.events.events.length = eventCount;
      throw err;
    }
  }
}
