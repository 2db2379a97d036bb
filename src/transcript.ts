import type { HistoryEvent, LogType, PlayerId } from './types.js';

export interface RenderedEvent {
  type: LogType;
  player?: string;
  content: string;
}

type NameLookup = (id: PlayerId) => string;

function namesOf(ids: readonly PlayerId[], name: NameLookup): string {
  return ids.map(name).join(', ');
}

const WIN_REASON_TEXT = {
  missions_succeeded: 'three missions succeeded',
  missions_failed: 'three missions failed',
  stalemate: 'too many proposals were rejected in a row',
  merlin_assassinated: 'the Assassin found Merlin',
  assassination_missed: 'the Assassin missed Merlin',
} as const;

/**
 * Display form of one history event. Mission cards are never attributed: a mission
 * vote renders as a submission and the result only carries the fail count.
 */
export function renderEvent(event: HistoryEvent, name: NameLookup): RenderedEvent {
  switch (event.kind) {
    case 'team_proposal':
      return {
        type: 'PROPOSAL',
        player: name(event.actor),
        content: `proposes ${namesOf(event.members, name)} for mission ${event.round} (proposal ${event.voteRound + 1})`,
      };
    case 'vote':
      return { type: 'VOTE', player: name(event.actor), content: event.approve ? 'approves' : 'rejects' };
    case 'vote_result': {
      const total = Object.keys(event.votes).length;
      const verdict = event.forced
        ? 'forced through after repeated rejections'
        : event.approved
          ? 'approved'
          : `rejected (${event.rejectStreak} in a row)`;
      return {
        type: 'VOTE',
        content: `Team ${namesOf(event.members, name)} ${verdict} with ${event.approvals}/${total} approvals`,
      };
    }
    case 'mission_vote':
      return { type: 'MISSION', player: name(event.actor), content: 'played a mission card' };
    case 'mission_result':
      return {
        type: 'MISSION',
        content: `Mission ${event.round} ${event.passed ? 'succeeded' : 'failed'} with ${event.failCount} fail card${event.failCount === 1 ? '' : 's'} (team: ${namesOf(event.team, name)})`,
      };
    case 'speech':
      return { type: 'CHAT', player: name(event.actor), content: event.text };
    case 'assassination':
      return {
        type: 'ASSASSINATION',
        player: name(event.actor),
        content: `assassinates ${name(event.target)}: ${event.hitMerlin ? 'that was Merlin' : 'not Merlin'}`,
      };
    case 'game_over':
      return {
        type: 'WIN',
        content: `Game Over! ${event.winner === 'good' ? 'Good' : 'Evil'} wins: ${WIN_REASON_TEXT[event.reason]}.`,
      };
  }
}

export function renderHistory(events: readonly HistoryEvent[], name: NameLookup): string[] {
  return events.map(e => {
    const r = renderEvent(e, name);
    return r.type === 'CHAT' && r.player
      ? `#${e.seq} ${r.player}: ${r.content}`
      : `#${e.seq} [${r.type}] ${r.player ? `${r.player} ` : ''}${r.content}`;
  });
}
