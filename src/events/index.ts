import type { GameLogEntry, HistoryEvent } from '../types.js';
import { TopicBus } from './eventBus.js';

export type BusTopics = {
  // Every log entry, public or private; the logger persists and prints these.
  log: GameLogEntry;
  // Engine history events, once every belief model has seen them.
  history: { gameId: string; event: HistoryEvent };
};

/** Process-wide bus shared by the logger, the sessions and the TUI. */
export const eventBus = new TopicBus<BusTopics>();
