import type { GameLogEntry, HistoryEvent, Team } from '../types.js';

export type Pov = { kind: 'all' } | { kind: 'public' } | { kind: 'player'; name: string };

export function povLabel(pov: Pov): string {
  return pov.kind === 'player' ? pov.name : pov.kind.toUpperCase();
}

/** The point of view after `pov`, cycling all -> public -> each player -> all. */
export function cyclePov(pov: Pov, players: readonly string[], step: 1 | -1): Pov {
  const order: Pov[] = [{ kind: 'all' }, { kind: 'public' }, ...players.map((name): Pov => ({ kind: 'player', name }))];
  const at = order.findIndex(p => povLabel(p) === povLabel(pov));
  return order[(Math.max(0, at) + step + order.length) % order.length] ?? { kind: 'all' };
}

export function isVisibleTo(entry: GameLogEntry, pov: Pov, showThoughts: boolean): boolean {
  if (!showThoughts && (entry.type === 'THOUGHT' || entry.type === 'BELIEF')) return false;
  if (pov.kind === 'all') return true;
  if (entry.metadata?.visibility === 'public') return true;
  if (pov.kind === 'public') return false;
  return entry.player === pov.name || entry.metadata?.['player'] === pov.name;
}

export interface TableStatus {
  round: number;
  missions: boolean[];
  rejectStreak: number;
  winner?: Team;
}

export const INITIAL_STATUS: TableStatus = { round: 1, missions: [], rejectStreak: 0 };

/** Folds one public history event into the header status. */
export function applyHistory(status: TableStatus, event: HistoryEvent): TableStatus {
  switch (event.kind) {
    case 'team_proposal':
      return { ...status, round: event.round };
    case 'vote_result':
      return { ...status, rejectStreak: event.rejectStreak };
    case 'mission_result':
      return { ...status, missions: [...status.missions, event.passed] };
    case 'game_over':
      return { ...status, winner: event.winner };
    case 'vote':
    case 'mission_vote':
    case 'speech':
    case 'assassination':
      return status;
  }
}

/**
 * Newest entries that fit in `rows` terminal rows of `width` columns, after skipping
 * `skipRows` rows from the bottom. Row counts are estimated from character width.
 */
export function tailThatFits<T>(items: readonly T[], render: (item: T) => string, rows: number, width: number, skipRows: number): T[] {
  const rowsOf = (text: string) =>
    width <= 0 ? 0 : text.split('\n').reduce((n, part) => n + Math.max(1, Math.ceil(part.length / width)), 0);
  const picked: T[] = [];
  let skipped = 0;
  let used = 0;
  for (let i = items.length - 1; i >= 0 && used < rows; i--) {
    const item = items[i];
    if (item === undefined) continue;
    const needed = rowsOf(render(item));
    if (skipped < skipRows) {
      skipped += needed;
      continue;
    }
    picked.unshift(item);
    used += needed;
  }
  return picked;
}
