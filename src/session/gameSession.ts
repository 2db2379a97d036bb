import { BeliefModel } from '../beliefs/beliefModel.js';
import { EvidenceProjector } from '../beliefs/evidenceProjector.js';
import type { DecisionKind, DecisionOf, DecisionProvider } from '../decisions/types.js';
import { parseDecision } from '../decisions/types.js';
import type { GameEngine } from '../engine/gameEngine.js';
import { GameRuleError, errorMessage, isGameRuleError, type GameErrorKind } from '../errors.js';
import { eventBus } from '../events/index.js';
import { logger } from '../logger.js';
import { AssassinationPhase } from '../phases/assassinationPhase.js';
import { MissionPhase } from '../phases/missionPhase.js';
import { RoundCompletionPhase } from '../phases/roundCompletionPhase.js';
import { TeamProposalPhase } from '../phases/teamProposalPhase.js';
import { TeamVotePhase } from '../phases/teamVotePhase.js';
import type { PhaseContext, PhaseRunner } from '../phases/types.js';
import type { HistoryEvent, Phase, PlayerId } from '../types.js';
import type { GameView } from '../view.js';

export type StepOutcome = { ok: true; view: GameView } | { ok: false; error: GameRuleError; view: GameView };

export interface GameSessionOptions {
  // Table talk before every team vote.
  discussion?: boolean;
  // Emit private BELIEF log lines whenever a trust estimate moves.
  logBeliefs?: boolean;
  // Safety cap for autoPlay.
  maxSteps?: number;
}

// Engine rejections of a provider's decision are reported as a rejected decision.
const ILLEGAL_DECISION: ReadonlySet<GameErrorKind> = new Set<GameErrorKind>([
  'IllegalProposal',
  'IllegalVote',
  'IllegalMissionVote',
  'IllegalAssassination',
  'IllegalSpeech',
]);

const RUNNERS: Record<Exclude<Phase, 'game_over'>, PhaseRunner> = {
  team_proposal: new TeamProposalPhase(),
  team_vote: new TeamVotePhase(),
  mission_vote: new MissionPhase(),
  mission_result: new RoundCompletionPhase(),
  assassination: new AssassinationPhase(),
};

/**
 * One running game: the engine, a belief model per seat and the decision provider.
 *
 * Steps are queued, so at most one runs at a time against this engine; provider calls
 * are awaited without holding anything that blocks other sessions.
 */
export class GameSession {
  readonly engine: GameEngine;
  readonly discussion: boolean;
  private provider: DecisionProvider;
  private beliefs: readonly BeliefModel[];
  private projector = new EvidenceProjector();
  private logBeliefs: boolean;
  private maxSteps: number;
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(engine: GameEngine, provider: DecisionProvider, opts: GameSessionOptions = {}) {
    this.engine = engine;
    this.provider = provider;
    this.discussion = opts.discussion ?? true;
    this.logBeliefs = opts.logBeliefs ?? false;
    this.maxSteps = opts.maxSteps ?? 500;
    const ids = engine.players.map(p => p.id);
    this.beliefs = engine.players.map(p => new BeliefModel(p.id, ids, engine.knowledgeOf(p.id)));
  }

  get gameId(): string {
    return this.engine.gameId;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  beliefsOf(id: PlayerId): BeliefModel {
    const model = this.beliefs[id];
    if (!model) throw new RangeError(`No player ${id} in game ${this.gameId}.`);
    return model;
  }

  view(playerId?: PlayerId): GameView {
    if (playerId === undefined) return this.engine.publicView();
    return this.engine.viewFor(playerId, this.beliefsOf(playerId).snapshot());
  }

  /** Advances exactly one phase transition. */
  step(): Promise<StepOutcome> {
    return this.enqueue(() => this.runStep());
  }

  /** Steps until the game ends or a step fails. */
  autoPlay(): Promise<StepOutcome> {
    return this.enqueue(async () => {
      let outcome: StepOutcome = { ok: true, view: this.view() };
      for (let i = 0; i < this.maxSteps && !this.engine.getState().gameOver; i++) {
        outcome = await this.runStep();
        if (!outcome.ok) return outcome;
      }
      return outcome;
    });
  }

  /** Tears the session down; steps already queued finish, later ones fail. */
  close(): void {
    this.closed = true;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only orders steps; the caller receives the failure through `run`.
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async runStep(): Promise<StepOutcome> {
    try {
      if (this.closed) {
        throw new GameRuleError('GameNotFound', `Game ${this.gameId} has ended.`);
      }
      const phase = this.engine.phase;
      if (phase === 'game_over') {
        throw new GameRuleError('IllegalTransition', 'The game is over.');
      }
      await RUNNERS[phase].run(this.context());
      return { ok: true, view: this.view() };
    } catch (error) {
      if (!isGameRuleError(error)) throw error;
      logger.log({
        type: 'SYSTEM',
        content: `Step failed (${error.kind}): ${error.message}`,
        metadata: { gameId: this.gameId, visibility: 'private', kind: 'step_failed' },
      });
      return { ok: false, error, view: this.view() };
    }
  }

  private context(): PhaseContext {
    return {
      engine: this.engine,
      discussion: this.discussion,
      decide: <K extends DecisionKind>(kind: K, actor: PlayerId) => this.decide(kind, actor),
      apply: transition => this.apply(transition),
    };
  }

  private async decide<K extends DecisionKind>(kind: K, actor: PlayerId): Promise<DecisionOf<K>> {
    const version = this.engine.version;
    let raw: unknown;
    try {
      raw = await this.provider.decide({ kind, actor, view: this.view(actor) });
    } catch (error) {
      if (isGameRuleError(error)) throw error;
      throw new GameRuleError('ProviderUnavailable', `${this.provider.name} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const decision = parseDecision(kind, raw, this.engine.playerCount);
    if (this.engine.version !== version) {
      throw new GameRuleError(
        'DecisionRejected',
        `${this.engine.nameOf(actor)} decided against version ${version}; the game is now at ${this.engine.version}.`
      );
    }
    return decision;
  }

  private apply(transition: () => HistoryEvent[]): HistoryEvent[] {
    let events: HistoryEvent[];
    try {
      events = transition();
    } catch (error) {
      if (isGameRuleError(error) && ILLEGAL_DECISION.has(error.kind)) {
        throw new GameRuleError('DecisionRejected', error.message, { cause: error });
      }
      throw error;
    }
    for (const event of events) {
      this.observe(event);
      eventBus.publish('history', { gameId: this.gameId, event });
    }
    return events;
  }

  // Feeds one event to every belief model, each seeing only what its owner may know.
  private observe(event: HistoryEvent): void {
    for (const player of this.engine.players) {
      const beliefs = this.beliefsOf(player.id);
      const ownMissionVote =
        event.kind === 'mission_result' ? this.engine.privateMissionVote(event.round, player.id) : undefined;
      const updates = this.projector.project(event, {
        observer: player.id,
        team: player.team,
        knowledge: this.engine.knowledgeOf(player.id),
        beliefs,
        ...(ownMissionVote === undefined ? {} : { ownMissionVote }),
      });
      const before = updates.length && this.logBeliefs ? beliefs.snapshot().trust : undefined;
      beliefs.applyEvent(event.seq, updates);

      if (before) {
        const after = beliefs.snapshot().trust;
        const moved = Object.keys(after)
          .map(Number)
          .filter(id => after[id] !== before[id])
          .map(id => `${this.engine.nameOf(id)} ${before[id]?.toFixed(2)}→${after[id]?.toFixed(2)}`);
        if (moved.length) {
          logger.log({
            type: 'BELIEF',
            player: player.name,
            content: moved.join(', '),
            metadata: { gameId: this.gameId, visibility: 'private', seq: event.seq },
          });
        }
      }
    }
  }
}
