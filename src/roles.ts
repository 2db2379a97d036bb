import { GameRuleError } from './errors.js';
import type { PlayerId, Role, Team } from './types.js';

export interface RoleCapabilities {
  seesEvil: boolean;
  seesMerlinAndMorgana: boolean;
  isAssassin: boolean;
  isConcealedFromMerlin: boolean;
  appearsAsMerlin: boolean;
  isHiddenFromEvil: boolean;
}

export interface RoleDefinition {
  role: Role;
  team: Team;
  summary: string;
  capabilities: RoleCapabilities;
}

const NO_CAPABILITIES: RoleCapabilities = {
  seesEvil: false,
  seesMerlinAndMorgana: false,
  isAssassin: false,
  isConcealedFromMerlin: false,
  appearsAsMerlin: false,
  isHiddenFromEvil: false,
};

export const ROLE_DEFINITIONS: Record<Role, RoleDefinition> = {
  merlin: {
    role: 'merlin',
    team: 'good',
    summary: 'Sees every Evil player except Mordred. Loses the game for Good if assassinated.',
    capabilities: { ...NO_CAPABILITIES, seesEvil: true },
  },
  percival: {
    role: 'percival',
    team: 'good',
    summary: 'Sees Merlin and Morgana but cannot tell which is which.',
    capabilities: { ...NO_CAPABILITIES, seesMerlinAndMorgana: true },
  },
  servant: {
    role: 'servant',
    team: 'good',
    summary: 'Loyal servant of Arthur. No special knowledge.',
    capabilities: NO_CAPABILITIES,
  },
  assassin: {
    role: 'assassin',
    team: 'evil',
    summary: 'Knows the other Evil players. After three successful missions, names Merlin to steal the win.',
    capabilities: { ...NO_CAPABILITIES, seesEvil: true, isAssassin: true },
  },
  morgana: {
    role: 'morgana',
    team: 'evil',
    summary: 'Knows the other Evil players and appears as Merlin to Percival.',
    capabilities: { ...NO_CAPABILITIES, seesEvil: true, appearsAsMerlin: true },
  },
  mordred: {
    role: 'mordred',
    team: 'evil',
    summary: 'Knows the other Evil players and is hidden from Merlin.',
    capabilities: { ...NO_CAPABILITIES, seesEvil: true, isConcealedFromMerlin: true },
  },
  oberon: {
    role: 'oberon',
    team: 'evil',
    summary: 'Evil, but neither sees nor is seen by the other Evil players.',
    capabilities: { ...NO_CAPABILITIES, isHiddenFromEvil: true },
  },
  minion: {
    role: 'minion',
    team: 'evil',
    summary: 'Minion of Mordred. Knows the other Evil players.',
    capabilities: { ...NO_CAPABILITIES, seesEvil: true },
  },
};

// Standard setups. Good/Evil split is 3/2 for five players and 4/2 for six.
const STANDARD_SETUPS: Record<number, readonly Role[]> = {
  5: ['merlin', 'percival', 'servant', 'assassin', 'morgana'],
  6: ['merlin', 'percival', 'servant', 'servant', 'assassin', 'morgana'],
};

const CANONICAL_EVIL_COUNT: Record<number, number> = { 5: 2, 6: 2 };

export const SUPPORTED_PLAYER_COUNTS: readonly number[] = [5, 6];

export interface RoleConfig {
  playerCount: number;
  roles: readonly Role[];
  goodCount: number;
  evilCount: number;
  // visibility[i] lists the indices into `roles` that role i is shown at game start.
  visibility: readonly (readonly number[])[];
}

/**
 * What one seat learns at game start.
 *
 * `knownTeams` holds alignments the viewer is certain of (shown directly or deduced from
 * the public setup); `merlinCandidates` holds Percival's indistinguishable pair.
 */
export interface RoleKnowledge {
  knownTeams: Record<PlayerId, Team>;
  merlinCandidates: PlayerId[];
}

export type Sight = 'evil' | 'merlin_candidate';

export function teamOf(role: Role): Team {
  return ROLE_DEFINITIONS[role].team;
}

export function assertSupportedPlayerCount(playerCount: number): void {
  if (!SUPPORTED_PLAYER_COUNTS.includes(playerCount)) {
    throw new GameRuleError(
      'UnsupportedPlayerCount',
      `Unsupported player count ${playerCount}. Supported: ${SUPPORTED_PLAYER_COUNTS.join(', ')}.`
    );
  }
}

/** What `viewer` is shown about `subject` at game start, or null for nothing. */
export function sightOf(viewer: Role, subject: Role): Sight | null {
  const v = ROLE_DEFINITIONS[viewer].capabilities;
  const s = ROLE_DEFINITIONS[subject];

  if (v.seesMerlinAndMorgana) {
    return subject === 'merlin' || s.capabilities.appearsAsMerlin ? 'merlin_candidate' : null;
  }
  if (!v.seesEvil || s.team !== 'evil') return null;

  if (teamOf(viewer) === 'good') {
    return s.capabilities.isConcealedFromMerlin ? null : 'evil';
  }
  return s.capabilities.isHiddenFromEvil ? null : 'evil';
}

export function buildRoleConfig(roles: readonly Role[]): RoleConfig {
  const evilCount = roles.filter(r => teamOf(r) === 'evil').length;
  const visibility = roles.map((viewer, i) =>
    roles.flatMap((subject, j) => (i !== j && sightOf(viewer, subject) !== null ? [j] : []))
  );
  return {
    playerCount: roles.length,
    roles: [...roles],
    goodCount: roles.length - evilCount,
    evilCount,
    visibility,
  };
}

export function rolesFor(playerCount: number): RoleConfig {
  assertSupportedPlayerCount(playerCount);
  const setup = STANDARD_SETUPS[playerCount];
  if (!setup) {
    throw new GameRuleError('UnsupportedPlayerCount', `No standard setup for ${playerCount} players.`);
  }
  return buildRoleConfig(setup);
}

/**
 * Validates a forced role list. It must keep the canonical Good/Evil split; a setup
 * without an Assassin is accepted (Good then wins outright on three successes).
 */
export function validateRoleSetup(roles: readonly Role[], playerCount: number): RoleConfig {
  assertSupportedPlayerCount(playerCount);
  if (roles.length !== playerCount) {
    throw new GameRuleError(
      'InvalidConfig',
      `Role setup lists ${roles.length} roles for ${playerCount} players.`
    );
  }
  const config = buildRoleConfig(roles);
  const expectedEvil = CANONICAL_EVIL_COUNT[playerCount];
  if (config.evilCount !== expectedEvil) {
    throw new GameRuleError(
      'InvalidConfig',
      `Role setup has ${config.evilCount} Evil roles; ${playerCount} players require ${expectedEvil}.`
    );
  }
  const assassins = roles.filter(r => ROLE_DEFINITIONS[r].capabilities.isAssassin).length;
  if (assassins > 1) {
    throw new GameRuleError('InvalidConfig', `Role setup has ${assassins} Assassins; at most one is allowed.`);
  }
  if (roles.filter(r => r === 'merlin').length > 1) {
    throw new GameRuleError('InvalidConfig', 'Role setup has more than one Merlin.');
  }
  return config;
}

export function hasAssassin(roles: readonly Role[]): boolean {
  return roles.some(r => ROLE_DEFINITIONS[r].capabilities.isAssassin);
}

export function knowledgeFor(viewer: PlayerId, rolesBySeat: readonly Role[]): RoleKnowledge {
  const viewerRole = rolesBySeat[viewer];
  if (viewerRole === undefined) {
    throw new RangeError(`No seat ${viewer} in a ${rolesBySeat.length}-player game.`);
  }

  const knownTeams: Record<PlayerId, Team> = {};
  const merlinCandidates: PlayerId[] = [];

  rolesBySeat.forEach((subject, seat) => {
    if (seat === viewer) return;
    const sight = sightOf(viewerRole, subject);
    if (sight === 'evil') knownTeams[seat] = 'evil';
    if (sight === 'merlin_candidate') merlinCandidates.push(seat);
  });

  // With no Morgana in the setup, Percival's single candidate can only be Merlin.
  const setupHasLookalike = rolesBySeat.some(r => ROLE_DEFINITIONS[r].capabilities.appearsAsMerlin);
  if (merlinCandidates.length > 0 && !setupHasLookalike) {
    for (const seat of merlinCandidates) knownTeams[seat] = 'good';
    merlinCandidates.length = 0;
  }

  // The setup is public: once every Evil seat is accounted for, the rest are Good.
  const evilTotal = rolesBySeat.filter(r => teamOf(r) === 'evil').length;
  const evilAccounted =
    Object.values(knownTeams).filter(t => t === 'evil').length + (teamOf(viewerRole) === 'evil' ? 1 : 0);
  if (evilAccounted === evilTotal) {
    rolesBySeat.forEach((_, seat) => {
      if (seat !== viewer && knownTeams[seat] === undefined) knownTeams[seat] = 'good';
    });
    merlinCandidates.length = 0;
  }

  return { knownTeams, merlinCandidates };
}

export function formatRoleSetupForPublicLog(roles: readonly Role[]): string {
  const counts = new Map<Role, number>();
  for (const r of roles) counts.set(r, (counts.get(r) ?? 0) + 1);
  const parts = [...counts.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([r, n]) => `${r}${n > 1 ? ` x${n}` : ''}`);
  return parts.length ? parts.join(', ') : '(unknown)';
}

export function formatRoleSetupForPrompt(roles: readonly Role[]): string {
  const unique = Array.from(new Set(roles)).sort((a, b) => a.localeCompare(b));
  const lines = unique.map(r => {
    const def = ROLE_DEFINITIONS[r];
    const count = roles.filter(x => x === r).length;
    const countStr = count > 1 ? ` x${count}` : '';
    return `- ${r}${countStr} (${def.team}): ${def.summary}`;
  });
  const evil = roles.filter(r => teamOf(r) === 'evil').length;

  return [
    'Role setup for this game (public knowledge):',
    ...lines,
    '',
    'Win conditions:',
    '- Good: three successful missions, and Merlin survives the assassination (if an Assassin is in play).',
    `- Evil (${evil} players): three failed missions, a stalemate of rejected proposals, or assassinating Merlin.`,
  ].join('\n');
}
