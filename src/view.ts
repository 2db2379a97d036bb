import type { BeliefSnapshot } from './beliefs/beliefModel.js';
import type { GameEngine } from './engine/gameEngine.js';
import { MISSION_ROUNDS, configFor } from './missions.js';
import { renderHistory } from './transcript.js';
import type {
  HistoryEvent,
  MissionConfig,
  MissionRecord,
  Phase,
  PlayerId,
  Role,
  StalemateConfig,
  Team,
  WinReason,
} from './types.js';

export interface PlayerSummary {
  id: PlayerId;
  name: string;
  // Present only for the viewer's own seat, or for everyone once the game is over.
  role?: Role;
  team?: Team;
}

export interface ViewerInfo {
  id: PlayerId;
  name: string;
  role: Role;
  team: Team;
  knownTeams: Record<PlayerId, Team>;
  merlinCandidates: PlayerId[];
  // The viewer's own sealed mission cards, by round.
  ownMissionVotes: Record<number, boolean>;
  beliefs?: BeliefSnapshot;
}

/**
 * Serializable snapshot of a game as one seat (or a spectator-free public log) sees it.
 * Individual mission cards of other players never appear.
 */
export interface GameView {
  gameId: string;
  version: number;
  phase: Phase;
  round: number;
  voteRound: number;
  rejectStreak: number;
  leader: PlayerId;
  currentProposal: PlayerId[];
  discussionHeld: boolean;
  mission: MissionConfig;
  missionTable: MissionConfig[];
  missionHistory: MissionRecord[];
  successfulMissions: number;
  failedMissions: number;
  stalemate: StalemateConfig;
  gameOver: boolean;
  winner?: Team;
  winReason?: WinReason;
  setup: Role[];
  players: PlayerSummary[];
  viewer?: ViewerInfo;
  history: HistoryEvent[];
  transcript: string[];
}

export function buildView(engine: GameEngine, viewerId?: PlayerId, beliefs?: BeliefSnapshot): GameView {
  const state = engine.getState();
  const history = engine.getHistory();
  const reveal = state.gameOver;

  const players = engine.players.map((p): PlayerSummary =>
    reveal || p.id === viewerId
      ? { id: p.id, name: p.name, role: p.role, team: p.team }
      : { id: p.id, name: p.name }
  );

  let viewer: ViewerInfo | undefined;
  if (viewerId !== undefined) {
    const self = engine.player(viewerId);
    const knowledge = engine.knowledgeOf(viewerId);
    const ownMissionVotes: Record<number, boolean> = {};
    for (const record of state.missionHistory) {
      const vote = engine.privateMissionVote(record.round, viewerId);
      if (vote !== undefined) ownMissionVotes[record.round] = vote;
    }
    viewer = {
      id: self.id,
      name: self.name,
      role: self.role,
      team: self.team,
      knownTeams: { ...knowledge.knownTeams },
      merlinCandidates: [...knowledge.merlinCandidates],
      ownMissionVotes,
      ...(beliefs ? { beliefs } : {}),
    };
  }

  const missionTable: MissionConfig[] = [];
  for (let round = 1; round <= MISSION_ROUNDS; round++) {
    missionTable.push(configFor(engine.playerCount, round));
  }

  return {
    gameId: engine.gameId,
    version: engine.version,
    phase: state.phase,
    round: state.round,
    voteRound: state.voteRound,
    rejectStreak: state.rejectStreak,
    leader: state.leaderIndex,
    currentProposal: state.currentProposal,
    discussionHeld: state.discussionHeld,
    mission: engine.currentMissionConfig(),
    missionTable,
    missionHistory: state.missionHistory,
    successfulMissions: state.successfulMissions,
    failedMissions: state.failedMissions,
    stalemate: { ...engine.stalemate },
    gameOver: state.gameOver,
    ...(state.winner ? { winner: state.winner } : {}),
    ...(state.winReason ? { winReason: state.winReason } : {}),
    setup: [...engine.roleConfig.roles].sort((a, b) => a.localeCompare(b)),
    players,
    ...(viewer ? { viewer } : {}),
    history,
    transcript: renderHistory(history, id => engine.nameOf(id)),
  };
}
