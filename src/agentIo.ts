import { GameRuleError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { type Decision, type DecisionProvider, type DecisionRequest, parseDecision } from './decisions/types.js';
import type { GameLogEntry } from './types.js';

export interface AgentIOConfig {
  decisionTimeoutMs: number;
  maxAttempts: number;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(
        () => reject(new GameRuleError('ProviderUnavailable', `Timeout after ${timeoutMs}ms`)),
        timeoutMs
      );
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/**
 * Caller-side retry policy around another provider.
 *
 * Each attempt is bounded by a timeout and its reply is validated; a malformed reply,
 * a timeout or an unavailable provider counts as a failed attempt. When every attempt
 * fails the fallback provider (if any) answers instead, otherwise the last error is
 * rethrown.
 */
export class RetryingDecisionProvider implements DecisionProvider {
  readonly name: string;
  private inner: DecisionProvider;
  private fallback?: DecisionProvider;
  private cfg: AgentIOConfig;

  constructor(inner: DecisionProvider, opts?: Partial<AgentIOConfig> & { fallback?: DecisionProvider }) {
    this.inner = inner;
    this.fallback = opts?.fallback;
    this.name = `retrying(${inner.name})`;
    this.cfg = {
      decisionTimeoutMs: opts?.decisionTimeoutMs ?? 60_000,
      maxAttempts: Math.max(1, opts?.maxAttempts ?? 2),
    };
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    const playerCount = request.view.players.length;
    const actor = request.view.players[request.actor]?.name ?? String(request.actor);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        const raw = await withTimeout(this.inner.decide(request), this.cfg.decisionTimeoutMs);
        return parseDecision(request.kind, raw, playerCount);
      } catch (err) {
        lastError = err;
      }

      logger.log({
        type: 'SYSTEM',
        content: `AgentIO: ${actor} ${request.kind} decision failed (attempt ${attempt}/${this.cfg.maxAttempts}): ${errorMessage(lastError)}`,
        metadata: {
          gameId: request.view.gameId,
          actor,
          kind: request.kind,
          attempt,
          visibility: 'private',
        } satisfies GameLogEntry['metadata'],
      });
    }

    if (this.fallback) {
      logger.log({
        type: 'SYSTEM',
        content: `AgentIO: ${actor} falls back to ${this.fallback.name} for ${request.kind}`,
        metadata: { gameId: request.view.gameId, actor, kind: request.kind, visibility: 'private' },
      });
      return parseDecision(request.kind, await this.fallback.decide(request), playerCount);
    }
    throw lastError;
  }
}
