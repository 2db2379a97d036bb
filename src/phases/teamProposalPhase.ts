import type { PhaseContext, PhaseRunner } from './types.js';

export class TeamProposalPhase implements PhaseRunner {
  async run(ctx: PhaseContext): Promise<void> {
    const leader = ctx.engine.leaderId();
    const { members } = await ctx.decide('team_proposal', leader);
    ctx.apply(() => ctx.engine.proposeTeam(leader, members));
  }
}
