import { errorMessage, isGameRuleError } from '../errors.js';
import { logger } from '../logger.js';
import type { PlayerId } from '../types.js';
import type { PhaseContext, PhaseRunner } from './types.js';

/**
 * Table talk about the proposed team, then one simultaneous vote, as two separate steps.
 *
 * Speakers go in seat order starting with the leader. A speaker whose provider fails is
 * skipped, and the discussion step closes once everyone had their turn. The vote step
 * commits nothing unless every ballot arrives, so a failed vote can be retried without
 * repeating the discussion.
 */
export class TeamVotePhase implements PhaseRunner {
  async run(ctx: PhaseContext): Promise<void> {
    const { engine } = ctx;
    if (ctx.discussion && !engine.getState().discussionHeld) {
      await this.discuss(ctx);
      ctx.apply(() => engine.closeDiscussion());
      return;
    }

    // Collect all votes concurrently so each agent decides in parallel.
    const ballots = await Promise.all(
      engine.players.map(async p => {
        const { approve } = await ctx.decide('vote', p.id);
        return [p.id, approve] as const;
      })
    );
    ctx.apply(() => engine.castVotes(new Map(ballots)));
  }

  private async discuss(ctx: PhaseContext): Promise<void> {
    const { engine } = ctx;
    const n = engine.playerCount;
    const order: PlayerId[] = Array.from({ length: n }, (_, i) => (engine.leaderId() + i) % n);

    for (const speaker of order) {
      try {
        const { text } = await ctx.decide('speech', speaker);
        ctx.apply(() => engine.recordSpeech(speaker, text));
      } catch (error) {
        if (!isGameRuleError(error, 'DecisionRejected') && !isGameRuleError(error, 'ProviderUnavailable')) throw error;
        logger.log({
          type: 'SYSTEM',
          content: `${engine.nameOf(speaker)} stays silent (${errorMessage(error)})`,
          metadata: { gameId: engine.gameId, visibility: 'private', kind: 'speech_skipped' },
        });
      }
    }
  }
}
