import test from 'node:test';
import assert from 'node:assert/strict';
import { GameRegistry } from './gameRegistry.js';
import type { DecisionProvider } from '../decisions/types.js';
import { isGameRuleError } from '../errors.js';
import { logger } from '../logger.js';

logger.setConsoleOutputEnabled(false);

const NAMES = ['Alice', 'Bob', 'Carol', 'Dave', 'Erin'];
const SIX = [...NAMES, 'Frank'];

const notFound = (e: unknown) => isGameRuleError(e, 'GameNotFound');

test('createGame returns the public view of a fresh game', () => {
  const registry = new GameRegistry();
  const view = registry.createGame(5, NAMES, { seed: 11 });
  assert.equal(view.phase, 'team_proposal');
  assert.equal(view.round, 1);
  assert.equal(view.viewer, undefined);
  assert.deepEqual(
    view.players.map(p => p.name),
    NAMES
  );
  assert.deepEqual(
    view.missionTable.map(m => m.teamSize),
    [2, 3, 2, 3, 3]
  );
  assert.deepEqual(registry.list(), [{ gameId: view.gameId, phase: 'team_proposal', round: 1, players: NAMES }]);
});

test('createGame rejects bad setups', () => {
  const registry = new GameRegistry();
  assert.throws(() => registry.createGame(4, NAMES.slice(0, 4)), (e: unknown) =>
    isGameRuleError(e, 'UnsupportedPlayerCount')
  );
  assert.throws(() => registry.createGame(5, ['A', 'B', 'C', 'D', 'A']), (e: unknown) =>
    isGameRuleError(e, 'InvalidConfig')
  );
  assert.deepEqual(registry.list(), []);
});

test('games run independently', async () => {
  const registry = new GameRegistry();
  const a = registry.createGame(5, NAMES, { seed: 1, discussion: false });
  const b = registry.createGame(6, SIX, { seed: 2, discussion: false });
  assert.notEqual(a.gameId, b.gameId);

  const stepped = await registry.step(a.gameId);
  assert.ok(stepped.ok);
  assert.equal(stepped.view.phase, 'team_vote');
  assert.equal(registry.view(b.gameId).phase, 'team_proposal');
  assert.equal(registry.view(b.gameId).mission.teamSize, 2);

  const finished = await registry.autoPlay(b.gameId);
  assert.ok(finished.ok);
  assert.equal(finished.view.gameOver, true);
  assert.equal(registry.view(a.gameId).phase, 'team_vote');
});

test('view for a seat carries only the private information of that seat', () => {
  const registry = new GameRegistry();
  const { gameId } = registry.createGame(5, NAMES, { roles: ['merlin', 'percival', 'servant', 'assassin', 'morgana'] });
  const merlin = registry.view(gameId, 0);
  assert.equal(merlin.viewer?.role, 'merlin');
  assert.deepEqual(merlin.viewer?.knownTeams, { 1: 'good', 2: 'good', 3: 'evil', 4: 'evil' });
  assert.deepEqual(
    merlin.players.map(p => p.role),
    ['merlin', undefined, undefined, undefined, undefined]
  );
  assert.deepEqual(merlin.viewer?.beliefs?.pinned, [1, 2, 3, 4]);
});

test('unknown and ended games are not found', async () => {
  const registry = new GameRegistry();
  const { gameId } = registry.createGame(5, NAMES);
  assert.throws(() => registry.step('missing'), notFound);
  assert.throws(() => registry.view('missing'), notFound);

  assert.ok(logger.registeredGames().includes(gameId));
  registry.endGame(gameId);
  assert.deepEqual(registry.list(), []);
  assert.equal(logger.registeredGames().includes(gameId), false);
  const late = logger.log({ type: 'CHAT', player: 'Alice', content: 'gg', metadata: { gameId, visibility: 'public' } });
  assert.equal(late.metadata?.role, undefined);
  assert.throws(() => registry.autoPlay(gameId), notFound);
  assert.throws(() => registry.endGame(gameId), notFound);
});

test('the provider factory is used unless a provider is passed', async () => {
  const made: string[] = [];
  const fixed: DecisionProvider = { name: 'fixed', decide: async () => ({ members: [0, 1] }) };
  const registry = new GameRegistry({
    providerFactory: engine => {
      made.push(engine.gameId);
      return fixed;
    },
  });
  const first = registry.createGame(5, NAMES);
  registry.createGame(5, NAMES, { provider: fixed });
  assert.deepEqual(made, [first.gameId]);

  const outcome = await registry.step(first.gameId);
  assert.ok(outcome.ok);
  assert.deepEqual(outcome.view.currentProposal, [0, 1]);
});
