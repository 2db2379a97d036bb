import test from 'node:test';
import assert from 'node:assert/strict';
import { GameEngine, MAX_SPEECH_CHARS } from './gameEngine.js';
import { isGameRuleError, type GameErrorKind } from '../errors.js';
import { logger } from '../logger.js';
import type { HistoryEvent, PlayerId, Role } from '../types.js';

logger.setConsoleOutputEnabled(false);

const NAMES5 = ['Alice', 'Bob', 'Carol', 'Dave', 'Erin'];
// Seats: 0 Merlin, 1 Percival, 2 Servant, 3 Assassin, 4 Morgana.
const ROLES5: Role[] = ['merlin', 'percival', 'servant', 'assassin', 'morgana'];

function newGame(opts: { roles?: Role[]; stalemate?: { limit?: number; outcome?: 'evil_wins' | 'auto_approve' } } = {}) {
  return new GameEngine(5, { names: NAMES5, roles: opts.roles ?? ROLES5, ...(opts.stalemate ? { stalemate: opts.stalemate } : {}) });
}

function isKind(kind: GameErrorKind) {
  return (error: unknown) => isGameRuleError(error, kind);
}

function everyone(engine: GameEngine, approve: boolean): Map<PlayerId, boolean> {
  return new Map(engine.players.map(p => [p.id, approve] as const));
}

// Propose a team of the right size from `pool`, approve it unanimously, play the cards
// (seat 3 fails when `sabotage` is set) and complete the round.
function playMission(engine: GameEngine, sabotage: boolean): void {
  const size = engine.currentMissionConfig().teamSize;
  const pool = sabotage ? [3, 0, 1, 2] : [0, 1, 2, 3];
  const team = pool.slice(0, size);
  engine.proposeTeam(engine.leaderId(), team);
  engine.castVotes(everyone(engine, true));
  engine.castMissionVotes(new Map(team.map(id => [id, !(sabotage && id === 3)] as const)));
  engine.completeRound();
}

function rejectOnce(engine: GameEngine): HistoryEvent[] {
  engine.proposeTeam(engine.leaderId(), [0, 1].slice(0, engine.currentMissionConfig().teamSize));
  return engine.castVotes(everyone(engine, false));
}

test('new game starts at the first proposal with leader 0', () => {
  const engine = newGame();
  const state = engine.getState();
  assert.equal(state.phase, 'team_proposal');
  assert.equal(state.round, 1);
  assert.equal(state.leaderIndex, 0);
  assert.equal(state.rejectStreak, 0);
  assert.equal(engine.version, 0);
  assert.deepEqual(engine.getHistory(), []);
  assert.deepEqual(
    engine.players.map(p => p.team),
    ['good', 'good', 'good', 'evil', 'evil']
  );
});

test('constructor rejects bad player counts, names and role setups', () => {
  assert.throws(() => new GameEngine(4, { names: NAMES5.slice(0, 4) }), isKind('UnsupportedPlayerCount'));
  assert.throws(() => new GameEngine(5, { names: NAMES5.slice(0, 4), roles: ROLES5 }), isKind('InvalidConfig'));
  assert.throws(
    () => new GameEngine(5, { names: ['Alice', 'Bob', 'Carol', 'Dave', 'Alice'], roles: ROLES5 }),
    isKind('InvalidConfig')
  );
  assert.throws(
    () => new GameEngine(5, { names: NAMES5, roles: ['merlin', 'servant', 'servant', 'servant', 'assassin'] }),
    isKind('InvalidConfig')
  );
  assert.throws(() => newGame({ stalemate: { limit: 0 } }), isKind('InvalidConfig'));
});

test('dealt roles follow the standard setup and repeat for the same seed', () => {
  const a = new GameEngine(6, { names: [...NAMES5, 'Frank'], seed: 42 });
  const b = new GameEngine(6, { names: [...NAMES5, 'Frank'], seed: 42 });
  assert.deepEqual(
    a.players.map(p => p.role),
    b.players.map(p => p.role)
  );
  assert.deepEqual(
    a.players.map(p => p.role).sort(),
    ['assassin', 'merlin', 'morgana', 'percival', 'servant', 'servant']
  );
});

test('illegal proposals leave the game untouched', () => {
  const engine = newGame();
  const before = engine.getState();

  assert.throws(() => engine.proposeTeam(1, [0, 1]), isKind('IllegalProposal'));
  assert.throws(() => engine.proposeTeam(0, [0, 1, 2]), isKind('IllegalProposal'));
  assert.throws(() => engine.proposeTeam(0, [1, 1]), isKind('IllegalProposal'));
  assert.throws(() => engine.proposeTeam(0, [0, 5]), isKind('IllegalProposal'));

  assert.deepEqual(engine.getState(), before);
  assert.equal(engine.version, 0);
  assert.equal(engine.getHistory().length, 0);
});

test('a valid proposal moves to the team vote and emits one event', () => {
  const engine = newGame();
  const events = engine.proposeTeam(0, [0, 2]);
  assert.deepEqual(events, [{ kind: 'team_proposal', actor: 0, members: [0, 2], voteRound: 0, seq: 0, round: 1 }]);
  assert.equal(engine.phase, 'team_vote');
  assert.deepEqual(engine.getState().currentProposal, [0, 2]);
  assert.equal(engine.version, 1);
});

test('votes must come from exactly every player', () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 2]);
  const partial = everyone(engine, true);
  partial.delete(4);
  assert.throws(() => engine.castVotes(partial), isKind('IllegalVote'));

  const extra = everyone(engine, true);
  extra.set(7, true);
  assert.throws(() => engine.castVotes(extra), isKind('IllegalVote'));
  assert.equal(engine.phase, 'team_vote');
});

test('a strict majority approves; the streak and vote round reset', () => {
  const engine = newGame();
  rejectOnce(engine);
  rejectOnce(engine);
  assert.equal(engine.getState().rejectStreak, 2);
  assert.equal(engine.getState().voteRound, 2);
  assert.equal(engine.leaderId(), 2);

  engine.proposeTeam(2, [0, 2]);
  const votes = new Map<PlayerId, boolean>([
    [0, true],
    [1, true],
    [2, true],
    [3, false],
    [4, false],
  ]);
  const events = engine.castVotes(votes);
  assert.equal(events.length, 6);
  const result = events[5];
  assert.ok(result?.kind === 'vote_result');
  assert.equal(result.approved, true);
  assert.equal(result.approvals, 3);

  const state = engine.getState();
  assert.equal(state.phase, 'mission_vote');
  assert.equal(state.rejectStreak, 0);
  assert.equal(state.voteRound, 0);
});

test('a tied vote rejects in a six-player game', () => {
  const engine = new GameEngine(6, {
    names: [...NAMES5, 'Frank'],
    roles: ['merlin', 'percival', 'servant', 'servant', 'assassin', 'morgana'],
  });
  engine.proposeTeam(0, [0, 1]);
  const votes = new Map<PlayerId, boolean>(engine.players.map(p => [p.id, p.id < 3] as const));
  const events = engine.castVotes(votes);
  const result = events.at(-1);
  assert.ok(result?.kind === 'vote_result');
  assert.equal(result.approvals, 3);
  assert.equal(result.approved, false);
  assert.equal(engine.phase, 'team_proposal');
  assert.equal(engine.leaderId(), 1);
});

test('five rejections in a row hand the game to Evil', () => {
  const engine = newGame();
  for (let i = 1; i <= 4; i++) {
    const result = rejectOnce(engine).find(e => e.kind === 'vote_result');
    assert.ok(result?.kind === 'vote_result');
    assert.equal(result.finalProposal, false);
    assert.equal(result.rejectStreak, i);
  }
  const events = rejectOnce(engine);
  const result = events.find(e => e.kind === 'vote_result');
  assert.ok(result?.kind === 'vote_result');
  assert.equal(result.finalProposal, true);
  assert.equal(result.rejectStreak, 5);
  assert.deepEqual(events.at(-1), { kind: 'game_over', winner: 'evil', reason: 'stalemate', seq: events.at(-1)?.seq, round: 1 });

  const state = engine.getState();
  assert.equal(state.gameOver, true);
  assert.equal(state.phase, 'game_over');
  assert.equal(state.winner, 'evil');
  assert.equal(state.winReason, 'stalemate');
});

test('five rejections hand Evil the game even after two successful missions', () => {
  const engine = newGame();
  playMission(engine, false);
  playMission(engine, false);
  assert.equal(engine.getState().successfulMissions, 2);

  for (let i = 0; i < 5; i++) rejectOnce(engine);
  const state = engine.getState();
  assert.equal(state.phase, 'game_over');
  assert.equal(state.winner, 'evil');
  assert.equal(state.winReason, 'stalemate');
  assert.equal(state.round, 3);
  assert.equal(engine.getHistory().some(e => e.kind === 'assassination'), false);
  assert.throws(() => engine.assassinate(3, 0), isKind('IllegalAssassination'));
});

test('the auto-approve policy forces the fifth rejected team through', () => {
  const engine = newGame({ stalemate: { outcome: 'auto_approve' } });
  for (let i = 0; i < 4; i++) rejectOnce(engine);
  const result = rejectOnce(engine).at(-1);
  assert.ok(result?.kind === 'vote_result');
  assert.equal(result.forced, true);
  assert.equal(result.approved, true);
  assert.equal(result.finalProposal, false);
  assert.equal(engine.phase, 'mission_vote');
  assert.equal(engine.getState().rejectStreak, 0);
});

test('mission cards: Good cannot fail and only the team may play', () => {
  const engine = newGame();
  engine.proposeTeam(0, [1, 3]);
  engine.castVotes(everyone(engine, true));

  assert.throws(
    () =>
      engine.castMissionVotes(
        new Map([
          [1, false],
          [3, true],
        ])
      ),
    isKind('IllegalMissionVote')
  );
  assert.throws(
    () =>
      engine.castMissionVotes(
        new Map([
          [1, true],
          [2, true],
        ])
      ),
    isKind('IllegalMissionVote')
  );
  assert.equal(engine.phase, 'mission_vote');
});

test('mission results expose only the fail count', () => {
  const engine = newGame();
  engine.proposeTeam(0, [1, 3]);
  engine.castVotes(everyone(engine, true));
  const events = engine.castMissionVotes(
    new Map([
      [1, true],
      [3, false],
    ])
  );

  assert.deepEqual(
    events.map(e => e.kind),
    ['mission_vote', 'mission_vote', 'mission_result']
  );
  for (const e of events.slice(0, 2)) {
    assert.deepEqual(Object.keys(e).sort(), ['actor', 'kind', 'round', 'seq']);
  }
  assert.deepEqual(events[2], { kind: 'mission_result', team: [1, 3], failCount: 1, passed: false, seq: events[2]?.seq, round: 1 });
  assert.equal(engine.phase, 'mission_result');
  assert.equal(engine.getState().failedMissions, 1);

  assert.equal(engine.privateMissionVote(1, 3), false);
  assert.equal(engine.privateMissionVote(1, 1), true);
  assert.equal(engine.privateMissionVote(1, 0), undefined);
});

test('completeRound only runs after a mission result', () => {
  const engine = newGame();
  assert.throws(() => engine.completeRound(), isKind('IllegalTransition'));
});

test('three successes open the assassination; naming Merlin wins for Evil', () => {
  const engine = newGame();
  playMission(engine, false);
  playMission(engine, true);
  playMission(engine, false);
  assert.equal(engine.getState().round, 4);
  playMission(engine, false);

  assert.equal(engine.phase, 'assassination');
  assert.equal(engine.assassinId(), 3);
  assert.throws(() => engine.assassinate(1, 0), isKind('IllegalAssassination'));
  assert.throws(() => engine.assassinate(3, 3), isKind('IllegalAssassination'));
  assert.throws(() => engine.assassinate(3, 9), isKind('IllegalAssassination'));

  const events = engine.assassinate(3, 0);
  assert.equal(events[0]?.kind, 'assassination');
  assert.ok(events[0]?.kind === 'assassination' && events[0].hitMerlin);
  const state = engine.getState();
  assert.equal(state.winner, 'evil');
  assert.equal(state.winReason, 'merlin_assassinated');
  assert.equal(state.phase, 'game_over');
});

test('a missed assassination wins for Good', () => {
  const engine = newGame();
  for (let i = 0; i < 3; i++) playMission(engine, false);
  engine.assassinate(3, 2);
  assert.equal(engine.getState().winner, 'good');
  assert.equal(engine.getState().winReason, 'assassination_missed');
});

test('without an Assassin three successes win outright', () => {
  const engine = newGame({ roles: ['merlin', 'percival', 'servant', 'morgana', 'minion'] });
  for (let i = 0; i < 3; i++) playMission(engine, false);
  const state = engine.getState();
  assert.equal(state.phase, 'game_over');
  assert.equal(state.winner, 'good');
  assert.equal(state.winReason, 'missions_succeeded');
});

test('three failures end the game for Evil without an assassination', () => {
  const engine = newGame();
  for (let i = 0; i < 3; i++) playMission(engine, true);
  const state = engine.getState();
  assert.equal(state.phase, 'game_over');
  assert.equal(state.winner, 'evil');
  assert.equal(state.winReason, 'missions_failed');
  assert.equal(state.missionHistory.length, 3);
  assert.throws(() => engine.proposeTeam(engine.leaderId(), [0, 1]), isKind('IllegalProposal'));
  assert.throws(() => engine.recordSpeech(0, 'gg'), isKind('IllegalSpeech'));
});

test('speeches are trimmed, capped and never change the phase', () => {
  const engine = newGame();
  const [short] = engine.recordSpeech(1, '  I trust Alice.  ');
  assert.ok(short?.kind === 'speech');
  assert.equal(short.text, 'I trust Alice.');

  const [long] = engine.recordSpeech(2, 'x'.repeat(MAX_SPEECH_CHARS + 100));
  assert.ok(long?.kind === 'speech');
  assert.equal(long.text.length, MAX_SPEECH_CHARS);

  assert.throws(() => engine.recordSpeech(2, '   '), isKind('IllegalSpeech'));
  assert.throws(() => engine.recordSpeech(8, 'hello'), isKind('IllegalSpeech'));
  assert.equal(engine.phase, 'team_proposal');
  assert.equal(engine.version, 2);
});

test('history sequence numbers increase by one from zero', () => {
  const engine = newGame();
  rejectOnce(engine);
  playMission(engine, true);
  engine.recordSpeech(4, 'That was not me.');
  const seqs = engine.getHistory().map(e => e.seq);
  assert.deepEqual(
    seqs,
    seqs.map((_, i) => i)
  );
});

test('history and returned events are copies', () => {
  const engine = newGame();
  const [proposal] = engine.proposeTeam(0, [0, 1]);
  assert.ok(proposal?.kind === 'team_proposal');
  proposal.members.push(4);

  const [stored] = engine.getHistory();
  assert.ok(stored?.kind === 'team_proposal');
  assert.deepEqual(stored.members, [0, 1]);
  stored.members.length = 0;
  assert.deepEqual(engine.getState().currentProposal, [0, 1]);
  assert.deepEqual(engine.getHistory()[0], { kind: 'team_proposal', actor: 0, members: [0, 1], voteRound: 0, seq: 0, round: 1 });
});

test('discussion closes once per proposal', () => {
  const engine = newGame();
  assert.throws(() => engine.closeDiscussion(), isKind('IllegalTransition'));
  engine.proposeTeam(0, [0, 1]);
  assert.equal(engine.getState().discussionHeld, false);

  assert.deepEqual(engine.closeDiscussion(), []);
  assert.equal(engine.getState().discussionHeld, true);
  assert.equal(engine.phase, 'team_vote');
  assert.equal(engine.version, 2);
  assert.throws(() => engine.closeDiscussion(), isKind('IllegalTransition'));

  engine.castVotes(everyone(engine, false));
  engine.proposeTeam(1, [1, 2]);
  assert.equal(engine.getState().discussionHeld, false);
});
