import { randomUUID } from 'node:crypto';
import type { BeliefSnapshot } from '../beliefs/beliefModel.js';
import { GameRuleError } from '../errors.js';
import { logger } from '../logger.js';
import { MISSIONS_TO_WIN, configFor, missionFails } from '../missions.js';
import {
  ROLE_DEFINITIONS,
  type RoleConfig,
  type RoleKnowledge,
  formatRoleSetupForPublicLog,
  hasAssassin,
  knowledgeFor,
  rolesFor,
  teamOf,
  validateRoleSetup,
} from '../roles.js';
import { renderEvent } from '../transcript.js';
import type {
  GameState,
  HistoryEvent,
  HistoryEventInput,
  MissionConfig,
  Player,
  PlayerId,
  Role,
  StalemateConfig,
  Team,
  WinReason,
} from '../types.js';
import { mulberry32, shuffleInPlace } from '../utils.js';
import { type GameView, buildView } from '../view.js';

export const MAX_SPEECH_CHARS = 500;

export interface GameEngineOptions {
  names: readonly string[];
  // Forced roles in seat order; dealt from the standard setup when omitted.
  roles?: readonly Role[];
  seed?: number;
  stalemate?: Partial<StalemateConfig>;
  gameId?: string;
}

type Votes = ReadonlyMap<PlayerId, boolean>;

/**
 * Authoritative state machine for one Avalon game.
 *
 * Every mutating operation validates completely before it changes anything: it either
 * commits a new state plus its history events, or throws a `GameRuleError` and leaves
 * the game exactly as it was.
 */
export class GameEngine {
  readonly gameId: string;
  readonly players: readonly Player[];
  readonly roleConfig: RoleConfig;
  readonly stalemate: StalemateConfig;

  private state: GameState;
  private history: HistoryEvent[] = [];
  private nextSeq = 0;
  private revision = 0;
  private knowledge: readonly RoleKnowledge[];
  // Mission cards by round, readable only by the member who played them.
  private sealedMissionVotes = new Map<number, ReadonlyMap<PlayerId, boolean>>();

  constructor(playerCount: number, opts: GameEngineOptions) {
    this.gameId = opts.gameId ?? randomUUID();
    this.stalemate = {
      limit: opts.stalemate?.limit ?? 5,
      outcome: opts.stalemate?.outcome ?? 'evil_wins',
    };
    if (!Number.isInteger(this.stalemate.limit) || this.stalemate.limit < 1) {
      throw new GameRuleError('InvalidConfig', `Stalemate limit must be a positive integer (got ${this.stalemate.limit}).`);
    }

    const rolesBySeat = this.dealRoles(playerCount, opts);
    this.roleConfig = validateRoleSetup(rolesBySeat, playerCount);

    const names = opts.names.map(n => n.trim());
    if (names.length !== playerCount) {
      throw new GameRuleError('InvalidConfig', `Expected ${playerCount} player names, got ${names.length}.`);
    }
    if (names.some(n => n === '') || new Set(names).size !== names.length) {
      throw new GameRuleError('InvalidConfig', 'Player names must be non-empty and distinct.');
    }

    this.knowledge = rolesBySeat.map((_, seat) => knowledgeFor(seat, rolesBySeat));
    this.players = rolesBySeat.map((role, seat) => ({
      id: seat,
      name: names[seat] ?? `Player ${seat}`,
      role,
      team: teamOf(role),
      visibility: this.roleConfig.visibility[seat] ?? [],
    }));

    this.state = {
      phase: 'team_proposal',
      round: 1,
      voteRound: 0,
      rejectStreak: 0,
      leaderIndex: 0,
      currentProposal: [],
      discussionHeld: false,
      missionHistory: [],
      successfulMissions: 0,
      failedMissions: 0,
      gameOver: false,
    };

    logger.registerGame(this.gameId, Object.fromEntries(this.players.map(p => [p.name, p.role])));
    logger.log({
      type: 'SYSTEM',
      content: `Game ${this.gameId} created. Roles this game: ${formatRoleSetupForPublicLog(rolesBySeat)}`,
      metadata: { gameId: this.gameId, visibility: 'public' },
    });
    for (const p of this.players) {
      logger.log({
        type: 'SYSTEM',
        content: `Assigned role ${p.role} to ${p.name}`,
        metadata: { gameId: this.gameId, role: p.role, player: p.name, visibility: 'private' },
      });
    }
  }

  // --- Read side ---

  get playerCount(): number {
    return this.players.length;
  }

  /** Increments on every committed transition; lets callers detect a stale decision. */
  get version(): number {
    return this.revision;
  }

  get phase(): GameState['phase'] {
    return this.state.phase;
  }

  getState(): GameState {
    return structuredClone(this.state);
  }

  getHistory(): HistoryEvent[] {
    return structuredClone(this.history);
  }

  player(id: PlayerId): Player {
    const p = this.players[id];
    if (!p) throw new RangeError(`No player ${id} in game ${this.gameId}.`);
    return p;
  }

  nameOf(id: PlayerId): string {
    return this.players[id]?.name ?? `Player ${id}`;
  }

  leaderId(): PlayerId {
    return this.state.leaderIndex;
  }

  knowledgeOf(id: PlayerId): RoleKnowledge {
    const k = this.knowledge[id];
    if (!k) throw new RangeError(`No player ${id} in game ${this.gameId}.`);
    return k;
  }

  currentMissionConfig(): MissionConfig {
    return configFor(this.playerCount, this.state.round);
  }

  assassinId(): PlayerId | undefined {
    return this.players.find(p => ROLE_DEFINITIONS[p.role].capabilities.isAssassin)?.id;
  }

  privateMissionVote(round: number, voter: PlayerId): boolean | undefined {
    return this.sealedMissionVotes.get(round)?.get(voter);
  }

  /** What `playerId` may see, optionally with that player's belief snapshot attached. */
  viewFor(playerId: PlayerId, beliefs?: BeliefSnapshot): GameView {
    return buildView(this, playerId, beliefs);
  }

  publicView(): GameView {
    return buildView(this);
  }

  // --- Transitions ---

  proposeTeam(leaderId: PlayerId, memberIds: readonly PlayerId[]): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'team_proposal') {
      throw new GameRuleError('IllegalProposal', `Cannot propose a team during ${s.phase}.`);
    }
    if (leaderId !== s.leaderIndex) {
      throw new GameRuleError('IllegalProposal', `${this.nameOf(leaderId)} is not the leader; ${this.nameOf(s.leaderIndex)} is.`);
    }
    const { teamSize } = this.currentMissionConfig();
    if (memberIds.length !== teamSize) {
      throw new GameRuleError('IllegalProposal', `Mission ${s.round} needs ${teamSize} members, got ${memberIds.length}.`);
    }
    if (new Set(memberIds).size !== memberIds.length) {
      throw new GameRuleError('IllegalProposal', 'Team members must be distinct.');
    }
    const outOfRange = memberIds.find(id => !this.isSeat(id));
    if (outOfRange !== undefined) {
      throw new GameRuleError('IllegalProposal', `Unknown player id ${outOfRange}.`);
    }

    const members = [...memberIds];
    return this.commit({ ...s, phase: 'team_vote', currentProposal: members, discussionHeld: false }, [
      { kind: 'team_proposal', actor: leaderId, members, voteRound: s.voteRound },
    ]);
  }

  castVotes(votes: Votes): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'team_vote') {
      throw new GameRuleError('IllegalVote', `Cannot vote on a team during ${s.phase}.`);
    }
    this.assertVoterSet(votes, this.players.map(p => p.id), 'IllegalVote', 'every player');

    const n = this.playerCount;
    const ballot: Record<PlayerId, boolean> = {};
    let approvals = 0;
    for (const p of this.players) {
      const approve = votes.get(p.id) === true;
      ballot[p.id] = approve;
      if (approve) approvals++;
    }
    // Strict majority; ties reject.
    const approved = approvals * 2 > n;
    const limit = this.stalemate.limit;
    const finalProposal = this.stalemate.outcome === 'evil_wins' && s.rejectStreak === limit - 1;

    const events: HistoryEventInput[] = this.players.map(
      (p): HistoryEventInput => ({ kind: 'vote', actor: p.id, approve: ballot[p.id] === true })
    );
    const result = {
      kind: 'vote_result' as const,
      leader: s.leaderIndex,
      members: [...s.currentProposal],
      votes: ballot,
      approvals,
      finalProposal,
    };

    if (approved) {
      events.push({ ...result, approved: true, rejectStreak: 0, forced: false });
      return this.commit({ ...s, phase: 'mission_vote', rejectStreak: 0, voteRound: 0 }, events);
    }

    const rejectStreak = s.rejectStreak + 1;
    if (rejectStreak >= limit && this.stalemate.outcome === 'auto_approve') {
      events.push({ ...result, approved: true, rejectStreak: 0, forced: true });
      return this.commit({ ...s, phase: 'mission_vote', rejectStreak: 0, voteRound: 0 }, events);
    }

    events.push({ ...result, approved: false, rejectStreak, forced: false });
    if (rejectStreak >= limit) {
      events.push({ kind: 'game_over', winner: 'evil', reason: 'stalemate' });
      return this.commit(this.finished(s, 'evil', 'stalemate', { rejectStreak, voteRound: s.voteRound + 1, currentProposal: [] }), events);
    }

    return this.commit(
      {
        ...s,
        phase: 'team_proposal',
        rejectStreak,
        voteRound: s.voteRound + 1,
        leaderIndex: (s.leaderIndex + 1) % n,
        currentProposal: [],
      },
      events
    );
  }

  castMissionVotes(votes: Votes): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'mission_vote') {
      throw new GameRuleError('IllegalMissionVote', `Cannot play mission cards during ${s.phase}.`);
    }
    this.assertVoterSet(votes, s.currentProposal, 'IllegalMissionVote', 'every team member');
    const goodSaboteur = s.currentProposal.find(id => votes.get(id) === false && this.player(id).team === 'good');
    if (goodSaboteur !== undefined) {
      throw new GameRuleError('IllegalMissionVote', `${this.nameOf(goodSaboteur)} is Good and cannot play a fail card.`);
    }

    const team = [...s.currentProposal];
    const failCount = team.filter(id => votes.get(id) === false).length;
    const { failsRequired } = this.currentMissionConfig();
    const passed = !missionFails(failCount, failsRequired);

    this.sealedMissionVotes.set(s.round, new Map(team.map(id => [id, votes.get(id) === true] as const)));

    const events: HistoryEventInput[] = team.map((id): HistoryEventInput => ({ kind: 'mission_vote', actor: id }));
    events.push({ kind: 'mission_result', team, failCount, passed });
    return this.commit(
      {
        ...s,
        phase: 'mission_result',
        missionHistory: [...s.missionHistory, { round: s.round, team, failCount, passed }],
        successfulMissions: s.successfulMissions + (passed ? 1 : 0),
        failedMissions: s.failedMissions + (passed ? 0 : 1),
      },
      events
    );
  }

  completeRound(): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'mission_result') {
      throw new GameRuleError('IllegalTransition', `Cannot complete a round during ${s.phase}.`);
    }

    if (s.failedMissions >= MISSIONS_TO_WIN) {
      return this.commit(this.finished(s, 'evil', 'missions_failed'), [
        { kind: 'game_over', winner: 'evil', reason: 'missions_failed' },
      ]);
    }
    if (s.successfulMissions >= MISSIONS_TO_WIN) {
      if (hasAssassin(this.roleConfig.roles)) {
        return this.commit({ ...s, phase: 'assassination', currentProposal: [] }, []);
      }
      return this.commit(this.finished(s, 'good', 'missions_succeeded'), [
        { kind: 'game_over', winner: 'good', reason: 'missions_succeeded' },
      ]);
    }

    return this.commit(
      {
        ...s,
        phase: 'team_proposal',
        round: s.round + 1,
        voteRound: 0,
        leaderIndex: (s.leaderIndex + 1) % this.playerCount,
        currentProposal: [],
      },
      []
    );
  }

  assassinate(assassinId: PlayerId, targetId: PlayerId): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'assassination') {
      throw new GameRuleError('IllegalAssassination', `Cannot assassinate during ${s.phase}.`);
    }
    if (assassinId !== this.assassinId()) {
      throw new GameRuleError('IllegalAssassination', `${this.nameOf(assassinId)} is not the Assassin.`);
    }
    if (!this.isSeat(targetId) || targetId === assassinId) {
      throw new GameRuleError('IllegalAssassination', `Invalid assassination target ${targetId}.`);
    }

    const hitMerlin = this.player(targetId).role === 'merlin';
    const winner: Team = hitMerlin ? 'evil' : 'good';
    const reason: WinReason = hitMerlin ? 'merlin_assassinated' : 'assassination_missed';
    return this.commit(this.finished(s, winner, reason), [
      { kind: 'assassination', actor: assassinId, target: targetId, hitMerlin },
      { kind: 'game_over', winner, reason },
    ]);
  }

  recordSpeech(speakerId: PlayerId, text: string): HistoryEvent[] {
    const s = this.state;
    if (s.gameOver) {
      throw new GameRuleError('IllegalSpeech', 'The game is over.');
    }
    if (!this.isSeat(speakerId)) {
      throw new GameRuleError('IllegalSpeech', `Unknown speaker ${speakerId}.`);
    }
    const trimmed = text.trim().slice(0, MAX_SPEECH_CHARS);
    if (!trimmed) {
      throw new GameRuleError('IllegalSpeech', `${this.nameOf(speakerId)} said nothing.`);
    }
    return this.commit({ ...s }, [{ kind: 'speech', actor: speakerId, text: trimmed }]);
  }

  /** Ends table talk on the current proposal; the team vote comes next. */
  closeDiscussion(): HistoryEvent[] {
    const s = this.state;
    if (s.phase !== 'team_vote') {
      throw new GameRuleError('IllegalTransition', `No proposal is under discussion during ${s.phase}.`);
    }
    if (s.discussionHeld) {
      throw new GameRuleError('IllegalTransition', 'The current proposal has already been discussed.');
    }
    return this.commit({ ...s, discussionHeld: true }, []);
  }

  // --- Internals ---

  private dealRoles(playerCount: number, opts: GameEngineOptions): Role[] {
    if (opts.roles) return [...opts.roles];
    const roles = [...rolesFor(playerCount).roles];
    const seed = opts.seed ?? Date.now();
    shuffleInPlace(roles, mulberry32(seed));
    return roles;
  }

  private isSeat(id: PlayerId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.playerCount;
  }

  private assertVoterSet(
    votes: Votes,
    expected: readonly PlayerId[],
    kind: 'IllegalVote' | 'IllegalMissionVote',
    who: string
  ): void {
    const missing = expected.filter(id => !votes.has(id));
    const extra = [...votes.keys()].filter(id => !expected.includes(id));
    if (missing.length > 0 || extra.length > 0) {
      const parts = [
        missing.length ? `missing ${missing.map(id => this.nameOf(id)).join(', ')}` : '',
        extra.length ? `unexpected ${extra.join(', ')}` : '',
      ].filter(Boolean);
      throw new GameRuleError(kind, `Expected exactly one vote from ${who}: ${parts.join('; ')}.`);
    }
  }

  private finished(s: GameState, winner: Team, winReason: WinReason, patch: Partial<GameState> = {}): GameState {
    return { ...s, ...patch, phase: 'game_over', winner, winReason, gameOver: true };
  }

  private commit(next: GameState, inputs: readonly HistoryEventInput[]): HistoryEvent[] {
    const round = this.state.round;
    const events = inputs.map((input): HistoryEvent => ({ ...input, seq: this.nextSeq++, round }));
    this.state = next;
    this.history.push(...events);
    this.revision++;

    for (const event of events) {
      const rendered = renderEvent(event, id => this.nameOf(id));
      logger.log({
        ...rendered,
        metadata: { gameId: this.gameId, seq: event.seq, kind: event.kind, visibility: 'public' },
      });
    }
    if (inputs.length === 0) {
      logger.log({
        type: 'SYSTEM',
        content: this.describePhase(next),
        metadata: { gameId: this.gameId, visibility: 'public' },
      });
    }
    // Callers get copies; stored events and state are never shared.
    return structuredClone(events);
  }

  private describePhase(s: GameState): string {
    if (s.phase === 'assassination') {
      return 'Good completed three missions. The Assassin may now name Merlin.';
    }
    if (s.phase === 'team_vote') {
      return `Discussion closed. Everyone votes on ${s.currentProposal.map(id => this.nameOf(id)).join(', ')}.`;
    }
    return `--- Mission ${s.round}: ${this.nameOf(s.leaderIndex)} leads ---`;
  }
}
