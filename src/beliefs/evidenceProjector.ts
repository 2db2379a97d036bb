import type { RoleKnowledge } from '../roles.js';
import type { HistoryEvent, PlayerId, Team } from '../types.js';
import type { BeliefModel, EvidenceReason, EvidenceUpdate } from './beliefModel.js';

export const TRUSTED_AT = 0.65;
export const SUSPECT_AT = 0.2;

// Likelihood pairs [P(e | Good), P(e | Evil)] for the fixed-strength evidence kinds.
export const LIKELIHOODS: Record<Exclude<EvidenceReason, 'mission_failed'>, readonly [number, number]> = {
  mission_succeeded: [0.55, 0.45],
  rejected_trusted_team: [0.4, 0.6],
  rejected_final_proposal: [0.25, 0.75],
  approved_suspect_team: [0.4, 0.6],
  proposed_suspect: [0.35, 0.65],
};

export interface ObserverContext {
  observer: PlayerId;
  team: Team;
  knowledge: RoleKnowledge;
  // Pre-event beliefs; read only.
  beliefs: BeliefModel;
  // The observer's own sealed mission card, when the event is a mission it sat on.
  ownMissionVote?: boolean;
}

function update(subject: PlayerId, reason: Exclude<EvidenceReason, 'mission_failed'>): EvidenceUpdate {
  const [likelihoodGood, likelihoodEvil] = LIKELIHOODS[reason];
  return { subject, reason, likelihoodGood, likelihoodEvil };
}

/**
 * Share `s` of the unexplained fail cards per suspect maps to [0.5 - 0.4s, 0.5 + 0.4s]:
 * every suspect certainly failed at s = 1, and the signal fades towards no evidence as
 * the fails spread over more members.
 */
export function failedMissionLikelihoods(share: number): readonly [number, number] {
  const s = Math.min(1, Math.max(0, share));
  return [0.5 - 0.4 * s, 0.5 + 0.4 * s];
}

/**
 * Turns engine history events into per-observer belief evidence.
 *
 * Each observer only uses what it is allowed to know: public events, its own sealed
 * mission card and its game-start knowledge. Pinned subjects and the observer itself are
 * never updated.
 */
export class EvidenceProjector {
  project(event: HistoryEvent, ctx: ObserverContext): EvidenceUpdate[] {
    switch (event.kind) {
      case 'mission_result':
        return this.fromMission(event.team, event.failCount, event.passed, ctx);
      case 'vote_result':
        return this.fromVotes(event.members, event.votes, event.finalProposal, ctx);
      case 'team_proposal':
        return this.fromProposal(event.actor, event.members, ctx);
      case 'vote':
      case 'mission_vote':
      case 'speech':
      case 'assassination':
      case 'game_over':
        return [];
    }
  }

  private isOpen(subject: PlayerId, ctx: ObserverContext): boolean {
    return subject !== ctx.observer && !ctx.beliefs.isPinned(subject);
  }

  private fromMission(team: readonly PlayerId[], failCount: number, passed: boolean, ctx: ObserverContext): EvidenceUpdate[] {
    const others = team.filter(id => id !== ctx.observer);
    const ownFail = team.includes(ctx.observer) && ctx.ownMissionVote === false ? 1 : 0;
    const knownEvil = others.filter(id => ctx.knowledge.knownTeams[id] === 'evil').length;
    const suspects = others.filter(id => this.isOpen(id, ctx));
    const unexplained = failCount - ownFail - knownEvil;

    if (unexplained > 0 && suspects.length > 0) {
      const [likelihoodGood, likelihoodEvil] = failedMissionLikelihoods(unexplained / suspects.length);
      return suspects.map((subject): EvidenceUpdate => ({ subject, reason: 'mission_failed', likelihoodGood, likelihoodEvil }));
    }
    if (passed && failCount === 0) {
      return suspects.map(subject => update(subject, 'mission_succeeded'));
    }
    return [];
  }

  private fromVotes(
    members: readonly PlayerId[],
    votes: Readonly<Record<PlayerId, boolean>>,
    finalProposal: boolean,
    ctx: ObserverContext
  ): EvidenceUpdate[] {
    const updates: EvidenceUpdate[] = [];

    for (const [key, approve] of Object.entries(votes)) {
      const voter = Number(key);
      if (!this.isOpen(voter, ctx)) continue;
      const teammates = members.filter(m => m !== voter);

      if (!approve) {
        if (finalProposal) {
          updates.push(update(voter, 'rejected_final_proposal'));
        } else if (teammates.length > 0 && teammates.every(m => this.isTrusted(m, ctx))) {
          updates.push(update(voter, 'rejected_trusted_team'));
        }
      } else if (teammates.some(m => this.isSuspect(m, ctx))) {
        updates.push(update(voter, 'approved_suspect_team'));
      }
    }
    return updates;
  }

  private fromProposal(leader: PlayerId, members: readonly PlayerId[], ctx: ObserverContext): EvidenceUpdate[] {
    if (!this.isOpen(leader, ctx)) return [];
    const includesSuspect = members.some(m => m !== leader && this.isSuspect(m, ctx));
    return includesSuspect ? [update(leader, 'proposed_suspect')] : [];
  }

  private isTrusted(subject: PlayerId, ctx: ObserverContext): boolean {
    if (subject === ctx.observer) return ctx.team === 'good';
    return ctx.beliefs.trustOf(subject) >= TRUSTED_AT;
  }

  private isSuspect(subject: PlayerId, ctx: ObserverContext): boolean {
    if (subject === ctx.observer) return false;
    return ctx.beliefs.trustOf(subject) <= SUSPECT_AT;
  }
}
