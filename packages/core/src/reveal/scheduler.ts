/**
 * Reveal Scheduler
 *
 * Finds tokens whose reveal delay has elapsed and reveals them through
 * the ledger. Can be polled by a host (revealAllReady) or run on its
 * own interval timer (start/stop).
 */

import { EventEmitter } from 'events';
import { MinterFault } from '../errors.js';
import type { MintLedger } from '../ledger/ledger.js';
import { Logger } from '../logger.js';

export class RevealScheduler extends EventEmitter {
  private ledger: MintLedger;
  private logger: Logger;
  private timer: NodeJS.Timeout | null = null;

  constructor(ledger: MintLedger, logger: Logger = Logger.forCollection(ledger.config)) {
    super();
    this.ledger = ledger;
    this.logger = logger.child('reveal');
  }

  /** Unknown ids are never ready */
  isReady(tokenId: number): boolean {
    const readyAt = this.ledger.revealReadyAt(tokenId);
    return readyAt !== undefined && this.ledger.now() >= readyAt;
  }

  /** Seconds left until reveal, 0 once ready, Infinity for unknown ids */
  secondsUntilReady(tokenId: number): number {
    const readyAt = this.ledger.revealReadyAt(tokenId);
    if (readyAt === undefined) return Infinity;
    return Math.max(0, readyAt - this.ledger.now());
  }

  /**
   * Reveal every ready, unrevealed token. A token that turns out not to
   * be ready when revealed is left for the next pass.
   */
  revealAllReady(): number[] {
    const revealed: number[] = [];

    for (const tokenId of this.ledger.tokenIds()) {
      if (this.ledger.isRevealed(tokenId) || !this.isReady(tokenId)) continue;

      const result = this.ledger.reveal(tokenId);
      if (result.ok) {
        revealed.push(tokenId);
      } else if (result.error.kind === 'RevealNotReady') {
        this.logger.debug(`#${tokenId} not ready yet, retrying next pass`);
      } else {
        throw new MinterFault(result.error);
      }
    }

    if (revealed.length > 0) {
      this.logger.info(`Revealed ${revealed.length} token(s)`);
      this.emit('revealed', revealed);
    }
    return revealed;
  }

  // ── Polling ─────────────────────────────────────────────────────

  start(intervalMs = 10_000): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.revealAllReady();
      } catch (err) {
        this.logger.error(`Reveal pass failed: ${err instanceof Error ? err.message : String(err)}`);
        if (this.listenerCount('error') > 0) this.emit('error', err);
      }
    }, intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
