import { NEUTRAL_PRIOR, type TrustOrder, rankByTrust } from '../beliefs/beliefModel.js';
import { SUSPECT_AT } from '../beliefs/evidenceProjector.js';
import { MISSIONS_TO_WIN } from '../missions.js';
import type { Personality, PlayerId, Team } from '../types.js';
import { fnv1a32, mulberry32 } from '../utils.js';
import type { GameView, ViewerInfo } from '../view.js';
import type { Decision, DecisionProvider, DecisionRequest } from './types.js';

export interface HeuristicOptions {
  seed?: number;
  // Per seat; seats without one play analytically.
  personalities?: readonly (Personality | undefined)[];
}

type Purpose = 'guide' | 'defend' | 'probe' | 'mislead';

interface Temperament {
  // Good: a teammate at or below this trust makes the team doubtful.
  doubtAt: number;
  // Good: from this proposal of the round on, a doubtful team is approved with `relentChance`.
  relentAfter: number;
  relentChance: number;
  // Evil: chance to back a team that carries no Evil player.
  evilApproveChance: number;
  // Evil: chance to fail a mission once the early rounds are over and nothing is decisive.
  sabotageChance: number;
  // Phrase swaps applied to every speech.
  tone: readonly (readonly [string, string])[];
}

const TEMPERAMENTS: Record<Personality, Temperament> = {
  analytical: { doubtAt: SUSPECT_AT, relentAfter: 3, relentChance: 0.6, evilApproveChance: 0.3, sabotageChance: 0.5, tone: [] },
  aggressive: {
    doubtAt: 0.35,
    relentAfter: 4,
    relentChance: 0.3,
    evilApproveChance: 0.15,
    sabotageChance: 1,
    tone: [
      ['looks trustworthy to me', 'is clearly on our side'],
      ['I would like them', 'I want them'],
      ['I have doubts about', 'I do not trust'],
      ['does not sit right with me', 'is lying to us'],
    ],
  },
  conservative: {
    doubtAt: 0.15,
    relentAfter: 2,
    relentChance: 1,
    evilApproveChance: 0.5,
    sabotageChance: 0,
    tone: [
      ['looks trustworthy to me', 'seems fairly trustworthy to me'],
      ['I have doubts about', 'I am not yet sure about'],
      ['does not sit right with me', 'might deserve a closer look'],
    ],
  },
  emotional: {
    doubtAt: SUSPECT_AT,
    relentAfter: 1,
    relentChance: 0.5,
    evilApproveChance: 0.4,
    sabotageChance: 0.5,
    tone: [
      ['looks trustworthy to me', 'feels trustworthy to me'],
      ['Check my votes', 'Trust me on this'],
      ['does not sit right with me', 'gives me a bad feeling'],
    ],
  },
};

export function applyTone(text: string, personality: Personality): string {
  return TEMPERAMENTS[personality].tone.reduce((out, [from, to]) => out.split(from).join(to), text);
}

/**
 * Rule-based policy driven only by the actor's redacted view and belief snapshot.
 *
 * Deterministic for a given seed: every coin flip is drawn from a generator seeded with
 * the seed, the actor, the request kind and the game version.
 */
export class HeuristicDecisionProvider implements DecisionProvider {
  readonly name = 'heuristic';
  private seed: number;
  private personalities: readonly (Personality | undefined)[];

  constructor(opts: HeuristicOptions = {}) {
    this.seed = opts.seed ?? 1;
    this.personalities = opts.personalities ?? [];
  }

  personalityOf(id: PlayerId): Personality {
    return this.personalities[id] ?? 'analytical';
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    const { view, actor } = request;
    const me = view.viewer;
    if (!me || me.id !== actor) {
      throw new Error(`Heuristic provider needs the view of player ${actor}.`);
    }
    const rng = mulberry32(fnv1a32(`${this.seed}|${actor}|${request.kind}|${view.version}`));

    switch (request.kind) {
      case 'team_proposal':
        return { kind: 'team_proposal', members: this.proposeTeam(view, me) };
      case 'vote':
        return { kind: 'vote', approve: this.vote(view, me, rng) };
      case 'mission_vote':
        return { kind: 'mission_vote', success: this.missionVote(view, me, rng) };
      case 'assassination':
        return { kind: 'assassination', target: this.assassinationTarget(view, me) };
      case 'speech':
        return { kind: 'speech', text: applyTone(this.speech(view, me), this.personalityOf(actor)) };
    }
  }

  private proposeTeam(view: GameView, me: ViewerInfo): PlayerId[] {
    const size = view.mission.teamSize;
    const others = ranked(view, me, 'trusted').filter(id => !(me.team === 'evil' && me.knownTeams[id] === 'evil'));
    // Evil leaders fill the remaining seats with players who look Good, keeping their
    // own card as the only fail.
    return [me.id, ...others].slice(0, size);
  }

  private vote(view: GameView, me: ViewerInfo, rng: () => number): boolean {
    const team = view.currentProposal;
    const lastChance = view.rejectStreak >= view.stalemate.limit - 1;
    const temper = TEMPERAMENTS[this.personalityOf(me.id)];

    if (me.team === 'good') {
      // A rejection here would hand Evil the game (or force the team through anyway).
      if (lastChance) return true;
      const flagged = team.some(
        id => id !== me.id && (me.knownTeams[id] === 'evil' || trustOf(me, id) <= temper.doubtAt)
      );
      if (!flagged) return true;
      // Late in the round, approve a doubtful team some of the time rather than stall.
      return view.voteRound >= temper.relentAfter && rng() < temper.relentChance;
    }

    const evilOnTeam = team.some(id => id === me.id || me.knownTeams[id] === 'evil');
    if (evilOnTeam) return true;
    if (lastChance && view.stalemate.outcome === 'evil_wins') return false;
    if (view.failedMissions >= MISSIONS_TO_WIN - 1) return true;
    return rng() < temper.evilApproveChance;
  }

  private missionVote(view: GameView, me: ViewerInfo, rng: () => number): boolean {
    if (me.team === 'good') return true;

    // One fail card per mission is enough; the lowest evil seat on the team plays it.
    const evilMates = view.currentProposal.filter(id => id !== me.id && me.knownTeams[id] === 'evil');
    if (evilMates.some(id => id < me.id)) return true;

    const decisive = view.failedMissions === MISSIONS_TO_WIN - 1 || view.successfulMissions === MISSIONS_TO_WIN - 1;
    if (decisive || view.round <= 2) return false;
    return rng() < 1 - TEMPERAMENTS[this.personalityOf(me.id)].sabotageChance;
  }

  private assassinationTarget(view: GameView, me: ViewerInfo): PlayerId {
    const candidates = ranked(view, me, 'trusted').filter(id => me.knownTeams[id] !== 'evil');
    // Merlin tends to vote down teams that carry Evil players.
    const score = (id: PlayerId) => merlinScore(view, me, id);
    const target = [...candidates].sort((a, b) => score(b) - score(a))[0] ?? view.players.find(p => p.id !== me.id)?.id;
    if (target === undefined) throw new Error('No assassination target available.');
    return target;
  }

  private speech(view: GameView, me: ViewerInfo): string {
    const name = (id: PlayerId | undefined) => view.players.find(p => p.id === id)?.name ?? 'someone';
    const trusted = ranked(view, me, 'trusted');
    const suspects = ranked(view, me, 'suspicious').filter(id => trustOf(me, id) < NEUTRAL_PRIOR);
    const onTeam = view.currentProposal.includes(me.id);

    switch (purposeOf(view, me.team, onTeam, suspects.length > 0)) {
      case 'guide': {
        const first = trusted[0];
        if (first === undefined) return 'We need to pick this team carefully and keep it clean.';
        const doubt = suspects[0];
        return doubt === undefined
          ? `${name(first)} looks trustworthy to me; I would like them on the mission.`
          : `${name(first)} looks trustworthy to me; I would like them on the mission. I have doubts about ${name(doubt)}.`;
      }
      case 'defend':
        return onTeam
          ? 'This team makes sense to me and I support it.'
          : 'Everything I have done follows from the record. Check my votes.';
      case 'probe': {
        if (view.round === 1 && view.missionHistory.length === 0) return 'First mission. Nothing to go on yet, so keep the team small and watch the votes.';
        const lastSpeaker = lastSpeakerOtherThan(view, me.id);
        if (lastSpeaker !== undefined) return `I would like to hear what ${name(lastSpeaker)} thinks about the next team.`;
        return view.failedMissions > 0
          ? 'A mission failed. Let us go back over who was on it.'
          : 'What does everyone think the next team should be?';
      }
      case 'mislead': {
        const target = trusted.find(id => me.knownTeams[id] !== 'evil');
        return target === undefined
          ? 'I think we should rethink the team composition.'
          : `Something about ${name(target)} does not sit right with me.`;
      }
    }
  }
}

function trustOf(me: ViewerInfo, id: PlayerId): number {
  const known: Team | undefined = me.knownTeams[id];
  if (known) return known === 'good' ? 1 : 0;
  return me.beliefs?.trust[id] ?? NEUTRAL_PRIOR;
}

// Other seats by trust; known alignments rank above or below every estimate.
function ranked(view: GameView, me: ViewerInfo, order: TrustOrder): PlayerId[] {
  const others = view.players.map(p => p.id).filter(id => id !== me.id);
  return rankByTrust(others, id => trustOf(me, id), order);
}

function purposeOf(view: GameView, team: Team, onTeam: boolean, hasSuspects: boolean): Purpose {
  if (team === 'good') {
    if (onTeam) return 'defend';
    return hasSuspects ? 'guide' : 'probe';
  }
  if (view.failedMissions >= MISSIONS_TO_WIN - 1 || onTeam) return 'defend';
  return 'mislead';
}

function merlinScore(view: GameView, me: ViewerInfo, id: PlayerId): number {
  let score = 0;
  for (const e of view.history) {
    if (e.kind !== 'vote_result') continue;
    const tainted = e.members.some(m => m === me.id || me.knownTeams[m] === 'evil');
    const approve = e.votes[id];
    if (approve === undefined) continue;
    if (tainted) score += approve ? -1 : 1;
    else score += approve ? 0.5 : -0.5;
  }
  return score;
}

function lastSpeakerOtherThan(view: GameView, self: PlayerId): PlayerId | undefined {
  for (let i = view.history.length - 1; i >= 0; i--) {
    const e = view.history[i];
    if (e?.kind === 'speech' && e.actor !== self) return e.actor;
  }
  return undefined;
}
