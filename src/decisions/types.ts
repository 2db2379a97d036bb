import { z } from 'zod';
import { GameRuleError } from '../errors.js';
import type { PlayerId } from '../types.js';
import type { GameView } from '../view.js';

const PlayerIdSchema = z.number().int().nonnegative();

export const TeamProposalDecisionSchema = z.object({
  kind: z.literal('team_proposal'),
  members: z.array(PlayerIdSchema).min(1),
});

export const VoteDecisionSchema = z.object({
  kind: z.literal('vote'),
  approve: z.boolean(),
});

export const MissionVoteDecisionSchema = z.object({
  kind: z.literal('mission_vote'),
  success: z.boolean(),
});

export const AssassinationDecisionSchema = z.object({
  kind: z.literal('assassination'),
  target: PlayerIdSchema,
});

export const SpeechDecisionSchema = z.object({
  kind: z.literal('speech'),
  text: z.string().trim().min(1),
});

export const DecisionSchema = z.discriminatedUnion('kind', [
  TeamProposalDecisionSchema,
  VoteDecisionSchema,
  MissionVoteDecisionSchema,
  AssassinationDecisionSchema,
  SpeechDecisionSchema,
]);

export type Decision = z.infer<typeof DecisionSchema>;
export type DecisionKind = Decision['kind'];
export type DecisionOf<K extends DecisionKind> = Extract<Decision, { kind: K }>;

export const DECISION_KINDS: readonly DecisionKind[] = ['team_proposal', 'vote', 'mission_vote', 'assassination', 'speech'];

export interface DecisionRequest<K extends DecisionKind = DecisionKind> {
  kind: K;
  actor: PlayerId;
  // Redacted for `actor`, including its own belief snapshot.
  view: GameView;
}

/**
 * Source of decisions for one or more seats. Results are untrusted: the session parses
 * them with `parseDecision` and the engine checks them against the rules.
 */
export interface DecisionProvider {
  readonly name: string;
  decide(request: DecisionRequest): Promise<unknown>;
}

const SCHEMAS: { [K in DecisionKind]: z.ZodType<DecisionOf<K>> } = {
  team_proposal: TeamProposalDecisionSchema,
  vote: VoteDecisionSchema,
  mission_vote: MissionVoteDecisionSchema,
  assassination: AssassinationDecisionSchema,
  speech: SpeechDecisionSchema,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function idsIn(decision: Decision): PlayerId[] {
  switch (decision.kind) {
    case 'team_proposal':
      return decision.members;
    case 'assassination':
      return [decision.target];
    case 'vote':
    case 'mission_vote':
    case 'speech':
      return [];
  }
}

/**
 * Strict parse of a raw provider reply into the decision `kind` asked for.
 *
 * A payload without a `kind` field is read as that kind; a payload naming a different
 * kind, failing the schema or naming a seat outside `0..playerCount-1` is a
 * `DecisionRejected`.
 */
export function parseDecision<K extends DecisionKind>(kind: K, raw: unknown, playerCount: number): DecisionOf<K> {
  const candidate = isRecord(raw) && !('kind' in raw) ? { ...raw, kind } : raw;
  const schema: z.ZodType<DecisionOf<K>> = SCHEMAS[kind];
  const result = schema.safeParse(candidate);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new GameRuleError('DecisionRejected', `Malformed ${kind} decision: ${detail}`, { cause: result.error });
  }

  const outOfRange = idsIn(result.data).find(id => id >= playerCount);
  if (outOfRange !== undefined) {
    throw new GameRuleError('DecisionRejected', `Player id ${outOfRange} is out of range for a ${playerCount}-player game.`);
  }
  return result.data;
}
