import { GameRuleError } from '../errors.js';
import type { PhaseContext, PhaseRunner } from './types.js';

export class AssassinationPhase implements PhaseRunner {
  async run(ctx: PhaseContext): Promise<void> {
    const { engine } = ctx;
    const assassin = engine.assassinId();
    if (assassin === undefined) {
      throw new GameRuleError('IllegalTransition', 'No Assassin is in play.');
    }
    const { target } = await ctx.decide('assassination', assassin);
    ctx.apply(() => engine.assassinate(assassin, target));
  }
}
