/**
 * Allowlist Registry
 *
 * Set of normalized addresses allowed to mint during the Allowlist
 * phase. Uses the same normalization as mint-time checks.
 */

import { type Address, normalizeAddress, parseAddress } from '../address.js';
import type { Clock } from '../clock.js';
import { fail, ok, type Result } from '../errors.js';
import type { EventLog } from '../events.js';

export class AllowlistRegistry {
  private members: Set<Address> = new Set();
  private events: EventLog;
  private clock: Clock;

  constructor(events: EventLog, clock: Clock) {
    this.events = events;
    this.clock = clock;
  }

  /**
   * Add a batch. Any malformed address rejects the whole batch.
   * Returns how many addresses were newly added.
   */
  add(addresses: readonly string[]): Result<number> {
    const parsed: Address[] = [];
    for (const address of addresses) {
      const normalized = parseAddress(address);
      if (!normalized) return fail({ kind: 'InvalidAddress', address });
      parsed.push(normalized);
    }

    let added = 0;
    for (const address of parsed) {
      if (!this.members.has(address)) {
        this.members.add(address);
        added++;
      }
    }

    this.events.append({ type: 'AllowlistUpdated', action: 'add', count: added }, this.clock.now());
    return ok(added);
  }

  /** Returns whether the address was a member */
  remove(address: string): Result<boolean> {
    const normalized = parseAddress(address);
    if (!normalized) return fail({ kind: 'InvalidAddress', address });

    const removed = this.members.delete(normalized);
    this.events.append({ type: 'AllowlistUpdated', action: 'remove', address: normalized }, this.clock.now());
    return ok(removed);
  }

  contains(address: string): boolean {
    return this.members.has(normalizeAddress(address));
  }

  size(): number {
    return this.members.size;
  }

  list(): Address[] {
    return Array.from(this.members);
  }
}
