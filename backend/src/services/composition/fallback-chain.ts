import { isFatal } from './errors';

/**
 * Best-effort stages as an ordered list of named strategies: the first one
 * that succeeds wins and every failure before it is kept for the job's
 * warnings. Fatal errors (cancellation, resource exhaustion) are rethrown
 * immediately instead of falling through to the next strategy.
 */

export interface Strategy<T> {
  name: string;
  attempt: () => Promise<T>;
}

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export type ChainOutcome<T> =
  | { ok: true; value: T; strategy: string; failures: StrategyFailure[] }
  | { ok: false; failures: StrategyFailure[] };

export async function runFallbackChain<T>(strategies: Strategy<T>[]): Promise<ChainOutcome<T>> {
  const failures: StrategyFailure[] = [];

  for (const strategy of strategies) {
    try {
      const value = await strategy.attempt();
      return { ok: true, value, strategy: strategy.name, failures };
    } catch (error) {
      if (isFatal(error)) throw error;
      failures.push({
        strategy: strategy.name,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { ok: false, failures };
}

export function describeFailures(failures: StrategyFailure[]): string {
  return failures.map((f) => `${f.strategy}: ${f.message}`).join('; ');
}
