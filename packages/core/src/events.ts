/**
 * Domain Event Log
 *
 * Append-only record of everything the minter did. Each append is
 * also emitted as 'event' and under its own type name.
 */

import { EventEmitter } from 'events';
import type { Address } from './address.js';
import type { Phase } from './ledger/phase.js';

// ── Types ──────────────────────────────────────────────────────────

export type MinterEventPayload =
  | { type: 'MintRequested'; tokenId: number; to: Address; pricePaidWei: bigint }
  | { type: 'TokenRevealed'; tokenId: number }
  | { type: 'AllowlistUpdated'; action: 'add'; count: number }
  | { type: 'AllowlistUpdated'; action: 'remove'; address: Address }
  | { type: 'PhaseAdvanced'; from: Phase; to: Phase };

export type MinterEventType = MinterEventPayload['type'];

export type MinterEvent = MinterEventPayload & {
  seq: number;        // 1-based position in the log
  timestamp: number;  // Clock seconds at append
};

// ── Event Log ──────────────────────────────────────────────────────

export class EventLog extends EventEmitter {
  private entries: MinterEvent[] = [];

  append(payload: MinterEventPayload, timestamp: number): MinterEvent {
    const event: MinterEvent = { ...payload, seq: this.entries.length + 1, timestamp };
    this.entries.push(event);
    this.emit('event', event);
    this.emit(event.type, event);
    return event;
  }

  all(): readonly MinterEvent[] {
    return this.entries;
  }

  ofType<K extends MinterEventType>(type: K): Array<Extract<MinterEvent, { type: K }>> {
    return this.entries.filter((e): e is Extract<MinterEvent, { type: K }> => e.type === type);
  }

  get length(): number {
    return this.entries.length;
  }
}
