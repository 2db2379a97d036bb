import test from 'node:test';
import assert from 'node:assert/strict';
import { HeuristicDecisionProvider, applyTone } from './heuristicProvider.js';
import type { DecisionKind, DecisionRequest } from './types.js';
import type { BeliefSnapshot } from '../beliefs/beliefModel.js';
import { GameEngine } from '../engine/gameEngine.js';
import { logger } from '../logger.js';
import type { Personality, PlayerId, Role } from '../types.js';
import { buildView } from '../view.js';

logger.setConsoleOutputEnabled(false);

const NAMES = ['Alice', 'Bob', 'Carol', 'Dave', 'Erin'];
// Seats: 0 Merlin, 1 Percival, 2 Servant, 3 Assassin, 4 Morgana.
const ROLES: Role[] = ['merlin', 'percival', 'servant', 'assassin', 'morgana'];

const provider = new HeuristicDecisionProvider({ seed: 42 });

function newGame(roles: Role[] = ROLES): GameEngine {
  return new GameEngine(5, { names: NAMES, roles });
}

function request(engine: GameEngine, kind: DecisionKind, actor: PlayerId, beliefs?: BeliefSnapshot): DecisionRequest {
  return { kind, actor, view: buildView(engine, actor, beliefs) };
}

function allVote(engine: GameEngine, approve: boolean): Map<PlayerId, boolean> {
  return new Map(engine.players.map(p => [p.id, approve] as const));
}

// Four rejected proposals: the next rejection ends the game under the default stalemate rule.
function toLastChance(engine: GameEngine): void {
  for (let i = 0; i < 4; i++) {
    engine.proposeTeam(engine.leaderId(), [0, 1]);
    engine.castVotes(allVote(engine, false));
  }
}

test('needs the view of the acting player', async () => {
  const engine = newGame();
  await assert.rejects(provider.decide({ kind: 'vote', actor: 1, view: buildView(engine, 2) }));
  await assert.rejects(provider.decide({ kind: 'vote', actor: 1, view: buildView(engine) }));
});

test('team proposal: Merlin picks known Good players, Evil leaders avoid their mates', async () => {
  const engine = newGame();
  assert.deepEqual(await provider.decide(request(engine, 'team_proposal', 0)), {
    kind: 'team_proposal',
    members: [0, 1],
  });
  assert.deepEqual(await provider.decide(request(engine, 'team_proposal', 3)), {
    kind: 'team_proposal',
    members: [3, 0],
  });
});

test('vote: Merlin rejects a team with an Evil player until the last chance', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 3]);
  assert.deepEqual(await provider.decide(request(engine, 'vote', 0)), { kind: 'vote', approve: false });
  // Seat 3 is on the team, so the Assassin backs it.
  assert.deepEqual(await provider.decide(request(engine, 'vote', 3)), { kind: 'vote', approve: true });

  const late = newGame();
  toLastChance(late);
  late.proposeTeam(late.leaderId(), [4, 3]);
  assert.deepEqual(await provider.decide(request(late, 'vote', 0)), { kind: 'vote', approve: true });
});

test('vote: Evil blocks a clean team on the last chance', async () => {
  const engine = newGame();
  toLastChance(engine);
  engine.proposeTeam(engine.leaderId(), [0, 1]);
  assert.deepEqual(await provider.decide(request(engine, 'vote', 3)), { kind: 'vote', approve: false });
  assert.deepEqual(await provider.decide(request(engine, 'vote', 4)), { kind: 'vote', approve: false });
});

test('mission vote: Good succeeds, one Evil card per mission', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [3, 4]);
  engine.castVotes(allVote(engine, true));
  // Round 1: the lower Evil seat fails and the other covers.
  assert.deepEqual(await provider.decide(request(engine, 'mission_vote', 3)), { kind: 'mission_vote', success: false });
  assert.deepEqual(await provider.decide(request(engine, 'mission_vote', 4)), { kind: 'mission_vote', success: true });

  const clean = newGame();
  clean.proposeTeam(0, [0, 1]);
  clean.castVotes(allVote(clean, true));
  assert.deepEqual(await provider.decide(request(clean, 'mission_vote', 1)), { kind: 'mission_vote', success: true });
});

test('assassination: targets the player who voted like Merlin', async () => {
  // Merlin sits at seat 2 here.
  const engine = newGame(['servant', 'percival', 'merlin', 'assassin', 'morgana']);
  assert.deepEqual(await provider.decide(request(engine, 'assassination', 3)), { kind: 'assassination', target: 0 });

  engine.proposeTeam(0, [1, 3]);
  engine.castVotes(
    new Map([
      [0, true],
      [1, true],
      [2, false],
      [3, true],
      [4, true],
    ])
  );
  assert.deepEqual(await provider.decide(request(engine, 'assassination', 3)), { kind: 'assassination', target: 2 });
});

test('speech: depends on side, team seat and suspicion', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 1]);

  assert.deepEqual(await provider.decide(request(engine, 'speech', 0)), {
    kind: 'speech',
    text: 'This team makes sense to me and I support it.',
  });
  assert.deepEqual(await provider.decide(request(engine, 'speech', 2)), {
    kind: 'speech',
    text: 'First mission. Nothing to go on yet, so keep the team small and watch the votes.',
  });

  const beliefs: BeliefSnapshot = { owner: 2, trust: { 0: 0.7, 1: 0.5, 3: 0.15, 4: 0.5 }, pinned: [] };
  assert.deepEqual(await provider.decide(request(engine, 'speech', 2, beliefs)), {
    kind: 'speech',
    text: 'Alice looks trustworthy to me; I would like them on the mission. I have doubts about Dave.',
  });
  assert.deepEqual(await provider.decide(request(engine, 'speech', 3)), {
    kind: 'speech',
    text: 'Something about Alice does not sit right with me.',
  });
});

test('same seed and view give the same decision', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 1]);
  const other = new HeuristicDecisionProvider({ seed: 42 });
  for (const actor of [0, 1, 2, 3, 4]) {
    assert.deepEqual(
      await provider.decide(request(engine, 'vote', actor)),
      await other.decide(request(engine, 'vote', actor))
    );
  }
});

function styled(seat: PlayerId, personality: Personality): HeuristicDecisionProvider {
  return new HeuristicDecisionProvider({
    seed: 42,
    personalities: Array.from({ length: 5 }, (_, i) => (i === seat ? personality : undefined)),
  });
}

function playRound(engine: GameEngine, team: PlayerId[], failBy?: PlayerId): void {
  engine.proposeTeam(engine.leaderId(), team);
  engine.castVotes(allVote(engine, true));
  engine.castMissionVotes(new Map(team.map(id => [id, id !== failBy] as const)));
  engine.completeRound();
}

test('personality: aggressive players doubt a lukewarm teammate', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 1]);
  const beliefs: BeliefSnapshot = { owner: 2, trust: { 0: 0.3, 1: 0.5, 3: 0.5, 4: 0.5 }, pinned: [] };

  assert.equal(styled(2, 'aggressive').personalityOf(2), 'aggressive');
  assert.equal(provider.personalityOf(2), 'analytical');
  assert.deepEqual(await provider.decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: true });
  assert.deepEqual(await styled(2, 'conservative').decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: true });
  assert.deepEqual(await styled(2, 'aggressive').decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: false });
});

test('personality: conservative players give in on the third proposal', async () => {
  const engine = newGame();
  for (let i = 0; i < 2; i++) {
    engine.proposeTeam(engine.leaderId(), [0, 1]);
    engine.castVotes(allVote(engine, false));
  }
  engine.proposeTeam(2, [2, 3]);
  const beliefs: BeliefSnapshot = { owner: 2, trust: { 0: 0.5, 1: 0.5, 3: 0.1, 4: 0.5 }, pinned: [] };

  assert.deepEqual(await provider.decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: false });
  assert.deepEqual(await styled(2, 'aggressive').decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: false });
  assert.deepEqual(await styled(2, 'conservative').decide(request(engine, 'vote', 2, beliefs)), { kind: 'vote', approve: true });
});

test('personality: mid-game sabotage depends on temperament', async () => {
  const engine = newGame();
  playRound(engine, [0, 1]);
  playRound(engine, [3, 0, 1], 3);
  assert.equal(engine.getState().round, 3);
  engine.proposeTeam(engine.leaderId(), [3, 0]);
  engine.castVotes(allVote(engine, true));

  assert.deepEqual(await styled(3, 'aggressive').decide(request(engine, 'mission_vote', 3)), { kind: 'mission_vote', success: false });
  assert.deepEqual(await styled(3, 'conservative').decide(request(engine, 'mission_vote', 3)), { kind: 'mission_vote', success: true });
});

test('personality: speeches change tone', async () => {
  const engine = newGame();
  engine.proposeTeam(0, [0, 1]);
  const beliefs: BeliefSnapshot = { owner: 2, trust: { 0: 0.7, 1: 0.5, 3: 0.15, 4: 0.5 }, pinned: [] };

  assert.deepEqual(await styled(2, 'aggressive').decide(request(engine, 'speech', 2, beliefs)), {
    kind: 'speech',
    text: 'Alice is clearly on our side; I want them on the mission. I do not trust Dave.',
  });
  assert.deepEqual(await styled(3, 'emotional').decide(request(engine, 'speech', 3)), {
    kind: 'speech',
    text: 'Something about Alice gives me a bad feeling.',
  });
  assert.equal(applyTone('Check my votes.', 'analytical'), 'Check my votes.');
  assert.equal(applyTone('Check my votes.', 'emotional'), 'Trust me on this.');
});
