import { GameRuleError } from './errors.js';
import { assertSupportedPlayerCount } from './roles.js';
import type { MissionConfig } from './types.js';

export const MISSION_ROUNDS = 5;
export const MISSIONS_TO_WIN = 3;

// Team size per round; every round of these tables fails on a single fail card.
const TEAM_SIZES: Record<number, readonly number[]> = {
  5: [2, 3, 2, 3, 3],
  6: [2, 3, 4, 3, 4],
};

const FAILS_REQUIRED: Record<number, readonly number[]> = {
  5: [1, 1, 1, 1, 1],
  6: [1, 1, 1, 1, 1],
};

export function configFor(playerCount: number, round: number): MissionConfig {
  assertSupportedPlayerCount(playerCount);
  if (!Number.isInteger(round) || round < 1 || round > MISSION_ROUNDS) {
    throw new GameRuleError('InvalidRound', `Invalid mission round ${round}. Rounds run 1..${MISSION_ROUNDS}.`);
  }
  const teamSize = TEAM_SIZES[playerCount]?.[round - 1];
  const failsRequired = FAILS_REQUIRED[playerCount]?.[round - 1] ?? 1;
  if (teamSize === undefined) {
    throw new GameRuleError('UnsupportedPlayerCount', `No mission table for ${playerCount} players.`);
  }
  return { round, teamSize, failsRequired };
}

export function missionFails(failCount: number, failsRequired: number): boolean {
  return failCount >= failsRequired;
}
