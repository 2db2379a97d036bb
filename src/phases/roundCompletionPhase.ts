import type { PhaseContext, PhaseRunner } from './types.js';

// Scores the finished mission; no decisions involved.
export class RoundCompletionPhase implements PhaseRunner {
  async run(ctx: PhaseContext): Promise<void> {
    ctx.apply(() => ctx.engine.completeRound());
  }
}
