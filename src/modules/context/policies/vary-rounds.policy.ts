/**
 * src/modules/context/policies/vary-rounds.policy.ts
 *
 * WHY:
 * - vary_rounds spreads new hashes over a small window around the configured rounds,
 *   so hashes made at the same time don't all share one cost.
 *
 * RULES:
 * - Pure function; randomness comes from the injected RandomSource.
 * - Linear cost: the window is rounds +/- delta, delta absolute or a percentage of rounds.
 * - log2 cost, absolute delta: rounds +/- delta in exponent units.
 * - log2 cost, percentage: the window is computed on 2^rounds, then mapped back to
 *   exponents (lower bound rounded up, upper bound rounded down) so it never widens.
 * - The window is clipped to [minRounds, maxRounds] before drawing.
 */

import type { RandomSource } from '../../../shared/security/random';
import type { RoundsCost } from '../../handlers/handler.types';
import type { VaryRounds } from '../../policy/policy.types';

export type RoundsWindow = { lower: number; upper: number };

export function varyRoundsWindow(rounds: number, vary: VaryRounds, cost: RoundsCost): RoundsWindow {
  if (cost === 'log2') {
    if (vary.kind === 'absolute') {
      return { lower: Math.max(0, rounds - vary.value), upper: rounds + vary.value };
    }
    const linear = 2 ** rounds;
    const delta = (linear * vary.value) / 100;
    return {
      lower: Math.ceil(Math.log2(Math.max(1, linear - delta))),
      upper: Math.floor(Math.log2(linear + delta)),
    };
  }

  const delta = vary.kind === 'percent' ? Math.floor((rounds * vary.value) / 100) : vary.value;
  return { lower: Math.max(1, rounds - delta), upper: rounds + delta };
}

export function applyVaryRounds(
  rounds: number,
  vary: VaryRounds,
  opts: { cost: RoundsCost; minRounds: number; maxRounds: number; random: RandomSource },
): number {
  const window = varyRoundsWindow(rounds, vary, opts.cost);
  const lower = Math.max(window.lower, opts.minRounds);
  const upper = Math.min(window.upper, opts.maxRounds);
  if (lower > upper) return rounds;
  return opts.random.int(lower, upper);
}
