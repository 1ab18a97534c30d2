/**
 * Claim Ledger
 *
 * Records which order holds each commission line. One ledger per shard,
 * owned by the task matching that shard; nothing else reads or writes it.
 */

import { compareIds } from './candidate-index.js';

export type ClaimKind = 'exact' | 'fuzzy';

export interface Claim {
  readonly lineId: string;
  readonly orderId: string;
  readonly kind: ClaimKind;
  readonly confidence: number;
}

export class ClaimLedger {
  private readonly claims = new Map<string, Claim>();

  get(lineId: string): Claim | undefined {
    return this.claims.get(lineId);
  }

  isClaimed(lineId: string): boolean {
    return this.claims.has(lineId);
  }

  /**
   * A line can be claimed when it is free, or held by a fuzzy claim that this
   * one outranks: a higher confidence, or the same confidence and a lower
   * order id. Exact claims are final.
   */
  canClaim(lineId: string, orderId: string, confidence: number): boolean {
    const existing = this.claims.get(lineId);
    if (!existing) return true;
    if (existing.kind === 'exact') return false;
    return (
      confidence > existing.confidence ||
      (confidence === existing.confidence && compareIds(orderId, existing.orderId) < 0)
    );
  }

  /**
   * Claim a line, returning the claim it displaced (if any).
   *
   * @throws Error when the line is not claimable
   */
  claim(lineId: string, orderId: string, kind: ClaimKind, confidence: number): Claim | undefined {
    if (!this.canClaim(lineId, orderId, confidence)) {
      throw new Error(`Line ${lineId} is already claimed by ${this.claims.get(lineId)?.orderId}`);
    }
    const displaced = this.claims.get(lineId);
    this.claims.set(lineId, Object.freeze({ lineId, orderId, kind, confidence }));
    return displaced;
  }
}
