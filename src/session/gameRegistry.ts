import { HeuristicDecisionProvider } from '../decisions/heuristicProvider.js';
import type { DecisionProvider } from '../decisions/types.js';
import { GameEngine } from '../engine/gameEngine.js';
import { GameRuleError } from '../errors.js';
import { logger } from '../logger.js';
import type { Phase, PlayerId, Role, StalemateConfig, Team } from '../types.js';
import type { GameView } from '../view.js';
import { GameSession, type StepOutcome } from './gameSession.js';

export interface CreateGameOptions {
  roles?: readonly Role[];
  seed?: number;
  stalemate?: Partial<StalemateConfig>;
  discussion?: boolean;
  logBeliefs?: boolean;
  // Defaults to the registry's provider factory.
  provider?: DecisionProvider;
}

export interface GameSummary {
  gameId: string;
  phase: Phase;
  round: number;
  players: string[];
  winner?: Team;
}

export type ProviderFactory = (engine: GameEngine, options: CreateGameOptions) => DecisionProvider;

const defaultProviderFactory: ProviderFactory = (_engine, options) =>
  new HeuristicDecisionProvider(options.seed === undefined ? {} : { seed: options.seed });

/**
 * Explicit store of running sessions, keyed by game id. Sessions share nothing but the
 * immutable rule tables.
 */
export class GameRegistry {
  private sessions = new Map<string, GameSession>();
  private providerFactory: ProviderFactory;

  constructor(opts: { providerFactory?: ProviderFactory } = {}) {
    this.providerFactory = opts.providerFactory ?? defaultProviderFactory;
  }

  createGame(playerCount: number, names: readonly string[], options: CreateGameOptions = {}): GameView {
    const engine = new GameEngine(playerCount, {
      names,
      ...(options.roles ? { roles: options.roles } : {}),
      ...(options.seed === undefined ? {} : { seed: options.seed }),
      ...(options.stalemate ? { stalemate: options.stalemate } : {}),
    });
    const provider = options.provider ?? this.providerFactory(engine, options);
    const session = new GameSession(engine, provider, {
      ...(options.discussion === undefined ? {} : { discussion: options.discussion }),
      ...(options.logBeliefs === undefined ? {} : { logBeliefs: options.logBeliefs }),
    });
    this.sessions.set(engine.gameId, session);
    return session.view();
  }

  get(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) throw new GameRuleError('GameNotFound', `No game with id ${gameId}.`);
    return session;
  }

  step(gameId: string): Promise<StepOutcome> {
    return this.get(gameId).step();
  }

  autoPlay(gameId: string): Promise<StepOutcome> {
    return this.get(gameId).autoPlay();
  }

  view(gameId: string, playerId?: PlayerId): GameView {
    return this.get(gameId).view(playerId);
  }

  endGame(gameId: string): void {
    const session = this.get(gameId);
    session.close();
    this.sessions.delete(gameId);
    logger.log({
      type: 'SYSTEM',
      content: `Game ${gameId} closed.`,
      metadata: { gameId, visibility: 'public' },
    });
    logger.unregisterGame(gameId);
  }

  list(): GameSummary[] {
    return [...this.sessions.values()].map(s => {
      const state = s.engine.getState();
      return {
        gameId: s.gameId,
        phase: state.phase,
        round: state.round,
        players: s.engine.players.map(p => p.name),
        ...(state.winner ? { winner: state.winner } : {}),
      };
    });
  }
}
