import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, parseConfig } from './config.js';
import { isGameRuleError } from './errors.js';
import { logger } from './logger.js';

logger.setConsoleOutputEnabled(false);

const invalid = (e: unknown) => isGameRuleError(e, 'InvalidConfig');
const players = (...names: string[]) => names.map(name => ({ name }));

test('parseConfig: defaults', () => {
  const config = parseConfig({ players: players('A', 'B', 'C', 'D', 'E') });
  assert.equal(config.provider, 'heuristic');
  assert.equal(config.discussion, true);
  assert.equal(config.log_thoughts, false);
  assert.equal(config.seed, undefined);
  assert.equal(config.roles, undefined);
  assert.deepEqual(config.stalemate, { limit: 5, outcome: 'evil_wins' });
  assert.deepEqual(config.agent_io, { decision_timeout_ms: 60_000, max_attempts: 2 });
  assert.deepEqual(config.players[0], { name: 'A', model: 'openai/gpt-4o', temperature: 0.7 });
});

test('parseConfig: rejects bad tables', () => {
  assert.throws(() => parseConfig({ players: players('A', 'B', 'C', 'D') }), invalid);
  assert.throws(() => parseConfig({ players: players('A', 'B', 'C', 'D', 'E', 'F', 'G') }), invalid);
  assert.throws(() => parseConfig({ players: players('A', 'B', 'C', 'D', ' A ') }), invalid);
  assert.throws(() => parseConfig({ players: players('A', 'B', 'C', 'D', 'E'), provider: 'oracle' }), invalid);
  assert.throws(
    () => parseConfig({ players: players('A', 'B', 'C', 'D', 'E'), stalemate: { limit: 0 } }),
    invalid
  );
  assert.throws(() => parseConfig(null), invalid);
});

test('parseConfig: forced roles must fit the table', () => {
  const five = players('A', 'B', 'C', 'D', 'E');
  const config = parseConfig({ players: five, roles: ['servant', 'merlin', 'servant', 'mordred', 'assassin'] });
  assert.deepEqual(config.roles, ['servant', 'merlin', 'servant', 'mordred', 'assassin']);

  assert.throws(() => parseConfig({ players: five, roles: ['merlin', 'servant', 'servant', 'servant', 'assassin'] }), invalid);
  assert.throws(() => parseConfig({ players: five, roles: ['merlin', 'servant', 'assassin', 'morgana'] }), invalid);
  assert.throws(() => parseConfig({ players: five, roles: ['merlin', 'servant', 'servant', 'jester', 'assassin'] }), invalid);
});

test('loadConfig: reads YAML from disk', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'avalon-config-'));
  try {
    const file = path.join(dir, 'game.yaml');
    fs.writeFileSync(
      file,
      [
        'provider: llm',
        'seed: 99',
        'stalemate:',
        '  outcome: auto_approve',
        'players:',
        ...['A', 'B', 'C', 'D', 'E', 'F'].map(n => `  - name: ${n}\n    temperature: 0.1`),
      ].join('\n')
    );
    const config = loadConfig(file);
    assert.equal(config.provider, 'llm');
    assert.equal(config.seed, 99);
    assert.deepEqual(config.stalemate, { limit: 5, outcome: 'auto_approve' });
    assert.equal(config.players.length, 6);
    assert.equal(config.players[5]?.temperature, 0.1);

    fs.writeFileSync(file, 'players: [');
    assert.throws(() => loadConfig(file));
    assert.throws(() => loadConfig(path.join(dir, 'missing.yaml')), { code: 'ENOENT' });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('loadConfig: the bundled game-config.yaml is valid', () => {
  const file = fileURLToPath(new URL('../game-config.yaml', import.meta.url));
  const config = loadConfig(file);
  assert.equal(config.players.length, 5);
  assert.equal(config.seed, 7);
  assert.equal(config.provider, 'heuristic');
  assert.deepEqual(
    config.players.map(p => p.personality),
    ['analytical', 'aggressive', undefined, 'conservative', undefined]
  );
});

test('parseConfig: personalities are optional and closed', () => {
  const config = parseConfig({ players: [{ name: 'A', personality: 'emotional' }, ...players('B', 'C', 'D', 'E')] });
  assert.equal(config.players[0]?.personality, 'emotional');
  assert.equal(config.players[1]?.personality, undefined);
  assert.throws(() => parseConfig({ players: [{ name: 'A', personality: 'reckless' }, ...players('B', 'C', 'D', 'E')] }), invalid);
});
