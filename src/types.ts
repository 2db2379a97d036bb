import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum([
  'merlin',
  'percival',
  'servant',
  'assassin',
  'morgana',
  'mordred',
  'oberon',
  'minion',
]);
export type Role = z.infer<typeof RoleSchema>;

export const TeamSchema = z.enum(['good', 'evil']);
export type Team = z.infer<typeof TeamSchema>;

export const PersonalitySchema = z.enum(['aggressive', 'conservative', 'analytical', 'emotional']);
export type Personality = z.infer<typeof PersonalitySchema>;

export const PlayerConfigSchema = z.object({
  name: z.string().min(1),
  // Play style for the heuristic policy and the default LLM persona.
  personality: PersonalitySchema.optional(),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o'),
  temperature: z.number().default(0.7),
  systemPrompt: z.string().optional(),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const StalemateOutcomeSchema = z.enum(['evil_wins', 'auto_approve']);
export type StalemateOutcome = z.infer<typeof StalemateOutcomeSchema>;

export const StalemateConfigSchema = z.object({
  // Consecutive rejected proposals that end the deadlock.
  limit: z.number().int().min(1).default(5),
  outcome: StalemateOutcomeSchema.default('evil_wins'),
});
export type StalemateConfig = z.infer<typeof StalemateConfigSchema>;

export const AgentIoConfigSchema = z.object({
  decision_timeout_ms: z.number().int().nonnegative().default(60_000),
  max_attempts: z.number().int().min(1).default(2),
});

export const GameConfigSchema = z.object({
  players: z.array(PlayerConfigSchema).min(5).max(6),
  provider: z.enum(['heuristic', 'llm']).default('heuristic'),
  // Seed for role dealing and the heuristic policy. Time-based when omitted.
  seed: z.number().int().optional(),
  // After each proposal, every player speaks once (leader first) before the team vote.
  discussion: z.boolean().default(true),
  stalemate: StalemateConfigSchema.default({}),
  // Forced role list in seat order (optional, for scripted games).
  roles: z.array(RoleSchema).optional(),
  agent_io: AgentIoConfigSchema.default({}),
  log_thoughts: z.boolean().default(false),
});
export type GameConfig = z.infer<typeof GameConfigSchema>;

// --- Game State Types ---

export type PlayerId = number;

export interface Player {
  id: PlayerId;
  name: string;
  role: Role;
  team: Team;
  // Ids whose hidden information this player was shown at game start.
  visibility: readonly PlayerId[];
}

export type Phase =
  | 'team_proposal'
  | 'team_vote'
  | 'mission_vote'
  | 'mission_result'
  | 'assassination'
  | 'game_over';

export interface MissionConfig {
  round: number;
  teamSize: number;
  failsRequired: number;
}

export interface MissionRecord {
  round: number;
  team: readonly PlayerId[];
  failCount: number;
  passed: boolean;
}

export type WinReason = 'missions_succeeded' | 'missions_failed' | 'stalemate' | 'merlin_assassinated' | 'assassination_missed';

export interface GameState {
  phase: Phase;
  round: number; // Mission round, 1..5
  voteRound: number; // Proposals voted on within the current round
  rejectStreak: number;
  leaderIndex: number;
  currentProposal: PlayerId[];
  // Table talk on the current proposal is over; the next team-vote step collects votes.
  discussionHeld: boolean;
  missionHistory: MissionRecord[];
  successfulMissions: number;
  failedMissions: number;
  winner?: Team;
  winReason?: WinReason;
  gameOver: boolean;
}

// --- History Types ---

interface HistoryEventBase {
  seq: number;
  round: number;
}

export type HistoryEvent =
  | (HistoryEventBase & { kind: 'team_proposal'; actor: PlayerId; members: PlayerId[]; voteRound: number })
  | (HistoryEventBase & { kind: 'vote'; actor: PlayerId; approve: boolean })
  | (HistoryEventBase & {
      kind: 'vote_result';
      leader: PlayerId;
      members: PlayerId[];
      votes: Record<PlayerId, boolean>;
      approvals: number;
      approved: boolean;
      rejectStreak: number;
      // Voted with one rejection left before the stalemate hands Evil the game.
      finalProposal: boolean;
      // Pushed through by the auto-approve stalemate policy.
      forced: boolean;
    })
  // The individual choice is sealed; only the fact that the member submitted is public.
  | (HistoryEventBase & { kind: 'mission_vote'; actor: PlayerId })
  | (HistoryEventBase & { kind: 'mission_result'; team: PlayerId[]; failCount: number; passed: boolean })
  | (HistoryEventBase & { kind: 'speech'; actor: PlayerId; text: string })
  | (HistoryEventBase & { kind: 'assassination'; actor: PlayerId; target: PlayerId; hitMerlin: boolean })
  | (HistoryEventBase & { kind: 'game_over'; winner: Team; reason: WinReason });

export type HistoryEventKind = HistoryEvent['kind'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

// Event payload as accepted by the engine's emitter (seq and round are stamped on emit).
export type HistoryEventInput = DistributiveOmit<HistoryEvent, 'seq' | 'round'>;

// --- Logging Types ---

export type LogType =
  | 'SYSTEM'
  | 'PROPOSAL'
  | 'VOTE'
  | 'MISSION'
  | 'CHAT'
  | 'ASSASSINATION'
  | 'WIN'
  | 'THOUGHT'
  | 'BELIEF';

export type LogVisibility = 'public' | 'private';

export interface GameLogMetadata {
  gameId?: string;
  role?: Role;
  visibility?: LogVisibility;
  kind?: string;
  seq?: number;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
