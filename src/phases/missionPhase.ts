import type { PhaseContext, PhaseRunner } from './types.js';

export class MissionPhase implements PhaseRunner {
  async run(ctx: PhaseContext): Promise<void> {
    const { engine } = ctx;
    const team = engine.getState().currentProposal;
    const cards = await Promise.all(
      team.map(async id => {
        const { success } = await ctx.decide('mission_vote', id);
        return [id, success] as const;
      })
    );
    ctx.apply(() => engine.castMissionVotes(new Map(cards)));
  }
}
