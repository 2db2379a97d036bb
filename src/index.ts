#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { RetryingDecisionProvider } from './agentIo.js';
import { loadConfig } from './config.js';
import { HeuristicDecisionProvider } from './decisions/heuristicProvider.js';
import { LlmDecisionProvider } from './decisions/llmProvider.js';
import type { DecisionProvider } from './decisions/types.js';
import { logger } from './logger.js';
import { GameRegistry } from './session/gameRegistry.js';
import type { GameConfig } from './types.js';

interface CliArgs {
  configFile: string;
  dryRun: boolean;
  seed?: number;
  ui: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let seed: number | undefined;
  let ui = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }

    if (arg === '--no-ui' || arg === '--no-tui') {
      ui = false;
      continue;
    }

    if (arg === '--seed') {
      const next = argv[i + 1];
      if (!next) throw new Error(`Missing value for ${arg}`);
      const n = Number(next);
      if (!Number.isInteger(n)) throw new Error(`Invalid seed "${next}" for ${arg}`);
      seed = n;
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'game-config.yaml', dryRun, ...(seed === undefined ? {} : { seed }), ui };
}

function buildProvider(config: GameConfig, seed: number, useLlm: boolean): DecisionProvider {
  const heuristic = new HeuristicDecisionProvider({ seed, personalities: config.players.map(p => p.personality) });
  if (!useLlm) return heuristic;
  return new RetryingDecisionProvider(
    new LlmDecisionProvider({ players: config.players, logThoughts: config.log_thoughts }),
    {
      decisionTimeoutMs: config.agent_io.decision_timeout_ms,
      maxAttempts: config.agent_io.max_attempts,
      fallback: heuristic,
    }
  );
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  logger.setPersistenceEnabled(true);
  if (args.ui) {
    // Rendered through the Ink TUI instead of raw lines; logs still go to disk.
    logger.setConsoleOutputEnabled(false);
  }

  const config = loadConfig(path.resolve(process.cwd(), args.configFile));
  const seed = args.seed ?? config.seed ?? Date.now();
  const useLlm = config.provider === 'llm' && !args.dryRun;

  if (args.dryRun) {
    logger.log({ type: 'SYSTEM', content: `Dry-run mode enabled (seed: ${seed}); all seats use the heuristic policy.` });
  }

  // Fail fast on missing auth for the AI Gateway.
  if (useLlm && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  const names = config.players.map(p => p.name);
  const registry = new GameRegistry();
  const created = registry.createGame(names.length, names, {
    seed,
    discussion: config.discussion,
    stalemate: config.stalemate,
    logBeliefs: config.log_thoughts,
    provider: buildProvider(config, seed, useLlm),
    ...(config.roles ? { roles: config.roles } : {}),
  });
  const ui = args.ui ? (await import('./ui/runUi.js')).runUi({ gameId: created.gameId, players: names }) : null;

  const gamePromise = registry.autoPlay(created.gameId).then(outcome => {
    if (!outcome.ok) {
      logger.log({
        type: 'SYSTEM',
        content: `Game stopped: ${outcome.error.kind}: ${outcome.error.message}`,
        metadata: { gameId: created.gameId, visibility: 'public' },
      });
      process.exitCode = 1;
    }
    registry.endGame(created.gameId);
  });

  if (!ui) {
    await gamePromise;
    return;
  }

  const uiPromise = ui.waitUntilExit().then(() => {
    // If the user leaves the UI early, keep the rest of the game visible on the console.
    logger.setConsoleOutputEnabled(true);
  });

  try {
    await Promise.all([gamePromise, uiPromise]);
  } finally {
    ui.unmount();
  }
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exit(1);
});
