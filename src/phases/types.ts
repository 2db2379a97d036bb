import type { DecisionKind, DecisionOf } from '../decisions/types.js';
import type { GameEngine } from '../engine/gameEngine.js';
import type { HistoryEvent, PlayerId } from '../types.js';

/** What a phase runner may do with the session driving it. */
export interface PhaseContext {
  readonly engine: GameEngine;
  readonly discussion: boolean;
  // Ask `actor` for a decision and parse it; rejects a reply made against a stale state.
  decide<K extends DecisionKind>(kind: K, actor: PlayerId): Promise<DecisionOf<K>>;
  // Run one engine transition built from provider decisions and feed its events to every belief model.
  apply(transition: () => HistoryEvent[]): HistoryEvent[];
}

export interface PhaseRunner {
  run(ctx: PhaseContext): Promise<void>;
}
