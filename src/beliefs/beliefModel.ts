import type { RoleKnowledge } from '../roles.js';
import type { PlayerId } from '../types.js';

export const TRUST_FLOOR = 0.05;
export const TRUST_CEILING = 0.95;
export const NEUTRAL_PRIOR = 0.5;

export type EvidenceReason =
  | 'mission_failed'
  | 'mission_succeeded'
  | 'rejected_trusted_team'
  | 'rejected_final_proposal'
  | 'approved_suspect_team'
  | 'proposed_suspect';

export interface EvidenceUpdate {
  subject: PlayerId;
  reason: EvidenceReason;
  likelihoodGood: number;
  likelihoodEvil: number;
}

export interface EvidenceLogEntry {
  seq: number;
  subject: PlayerId;
  reason: EvidenceReason;
  before: number;
  after: number;
}

export interface BeliefSnapshot {
  owner: PlayerId;
  trust: Record<PlayerId, number>;
  pinned: PlayerId[];
}

export type TrustOrder = 'trusted' | 'suspicious';

/** Orders `ids` by trust, highest first for `trusted`; ties break by seat. */
export function rankByTrust(ids: readonly PlayerId[], trustOf: (id: PlayerId) => number, order: TrustOrder): PlayerId[] {
  const sign = order === 'trusted' ? -1 : 1;
  return [...ids].sort((a, b) => sign * (trustOf(a) - trustOf(b)) || a - b);
}

export function clampTrust(p: number): number {
  return Math.min(TRUST_CEILING, Math.max(TRUST_FLOOR, p));
}

export function posterior(prior: number, likelihoodGood: number, likelihoodEvil: number): number {
  if (!(likelihoodGood > 0) || !(likelihoodEvil > 0) || !Number.isFinite(likelihoodGood) || !Number.isFinite(likelihoodEvil)) {
    throw new RangeError(`Likelihoods must be finite and positive (got ${likelihoodGood}, ${likelihoodEvil}).`);
  }
  const good = prior * likelihoodGood;
  const evil = (1 - prior) * likelihoodEvil;
  return clampTrust(good / (good + evil));
}

/**
 * One agent's private estimate that each other player is Good.
 *
 * Players whose alignment the owner learned at game start are pinned to the trust
 * bounds and never move. Everyone else starts at the neutral prior and is updated one
 * history event at a time.
 */
export class BeliefModel {
  readonly owner: PlayerId;
  private trust = new Map<PlayerId, number>();
  private pinned = new Set<PlayerId>();
  private evidenceLog: EvidenceLogEntry[] = [];
  private lastSeq = -1;

  constructor(owner: PlayerId, playerIds: readonly PlayerId[], knowledge: RoleKnowledge) {
    this.owner = owner;
    for (const id of playerIds) {
      if (id === owner) continue;
      const known = knowledge.knownTeams[id];
      if (known !== undefined) {
        this.trust.set(id, known === 'good' ? TRUST_CEILING : TRUST_FLOOR);
        this.pinned.add(id);
      } else {
        this.trust.set(id, NEUTRAL_PRIOR);
      }
    }
  }

  get log(): readonly EvidenceLogEntry[] {
    return this.evidenceLog;
  }

  subjects(): PlayerId[] {
    return [...this.trust.keys()];
  }

  trustOf(subject: PlayerId): number {
    const t = this.trust.get(subject);
    if (t === undefined) throw new RangeError(`Player ${this.owner} holds no belief about ${subject}.`);
    return t;
  }

  isPinned(subject: PlayerId): boolean {
    return this.pinned.has(subject);
  }

  /**
   * Applies every update derived from one history event. All posteriors are computed
   * from the pre-event trust, so the order of `updates` does not matter; events must
   * arrive in emission order.
   */
  applyEvent(seq: number, updates: readonly EvidenceUpdate[]): void {
    if (seq <= this.lastSeq) {
      throw new RangeError(`Event ${seq} arrived after event ${this.lastSeq} for observer ${this.owner}.`);
    }
    this.lastSeq = seq;

    const combined = new Map<PlayerId, { good: number; evil: number; reasons: EvidenceReason[] }>();
    for (const u of updates) {
      if (u.subject === this.owner || this.pinned.has(u.subject)) continue;
      if (!this.trust.has(u.subject)) {
        throw new RangeError(`Player ${this.owner} holds no belief about ${u.subject}.`);
      }
      const acc = combined.get(u.subject) ?? { good: 1, evil: 1, reasons: [] };
      acc.good *= u.likelihoodGood;
      acc.evil *= u.likelihoodEvil;
      acc.reasons.push(u.reason);
      combined.set(u.subject, acc);
    }

    for (const [subject, { good, evil, reasons }] of combined) {
      const before = this.trustOf(subject);
      const after = posterior(before, good, evil);
      this.trust.set(subject, after);
      for (const reason of reasons) {
        this.evidenceLog.push({ seq, subject, reason, before, after });
      }
    }
  }

  mostTrusted(count: number, exclude: readonly PlayerId[] = []): PlayerId[] {
    return this.ranked(exclude, 'trusted').slice(0, count);
  }

  mostSuspicious(count: number, exclude: readonly PlayerId[] = []): PlayerId[] {
    return this.ranked(exclude, 'suspicious').slice(0, count);
  }

  snapshot(): BeliefSnapshot {
    return {
      owner: this.owner,
      trust: Object.fromEntries(this.trust),
      pinned: [...this.pinned].sort((a, b) => a - b),
    };
  }

  private ranked(exclude: readonly PlayerId[], order: TrustOrder): PlayerId[] {
    const ids = [...this.trust.keys()].filter(id => !exclude.includes(id));
    return rankByTrust(ids, id => this.trustOf(id), order);
  }
}
