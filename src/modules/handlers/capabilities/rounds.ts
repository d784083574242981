import type { RoundsCapability, RoundsCost } from '../handler.types';

export function linearRounds(opts: {
  min: number;
  max: number;
  default: number;
  strictBounds?: boolean;
}): RoundsCapability {
  return roundsCapability('linear', opts);
}

export function log2Rounds(opts: {
  min: number;
  max: number;
  default: number;
  strictBounds?: boolean;
}): RoundsCapability {
  return roundsCapability('log2', opts);
}

/** Single-valued rounds for schemes whose cost is baked into the format. */
export function fixedRounds(value: number): RoundsCapability {
  return roundsCapability('linear', { min: value, max: value, default: value });
}

function roundsCapability(
  cost: RoundsCost,
  opts: { min: number; max: number; default: number; strictBounds?: boolean },
): RoundsCapability {
  return Object.freeze({
    minRounds: opts.min,
    maxRounds: opts.max,
    defaultRounds: opts.default,
    cost,
    strictBounds: opts.strictBounds ?? false,
  });
}
