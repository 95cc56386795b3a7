export interface RateAccumulator {
  base: number;
  multiplier: number;
  ceiling: number;
}

export type RateStage<TContext> = (
  context: TContext,
  accumulator: RateAccumulator,
) => void;

export interface SuccessRatePipeline<TContext> {
  readonly stages: readonly RateStage<TContext>[];
  apply(base: number, context: TContext): number;
}

/**
 * Compose pure stages into one probability transform. Multipliers stack;
 * the tightest ceiling wins and is applied last, so the result of a stack
 * of boosts never exceeds certainty.
 */
export function createSuccessRatePipeline<TContext>(
  stages: readonly RateStage<TContext>[],
): SuccessRatePipeline<TContext> {
  const frozenStages = Object.freeze([...stages]);

  return Object.freeze({
    stages: frozenStages,
    apply(base: number, context: TContext): number {
      const accumulator: RateAccumulator = {
        base,
        multiplier: 1,
        ceiling: Number.POSITIVE_INFINITY,
      };

      for (const stage of frozenStages) {
        stage(context, accumulator);
      }

      return Math.min(accumulator.base * accumulator.multiplier, accumulator.ceiling);
    },
  });
}

export function multiplierStage<TContext>(
  evaluate: (context: TContext) => number,
): RateStage<TContext> {
  return (context, accumulator) => {
    const factor = evaluate(context);
    if (!Number.isFinite(factor) || factor < 0) {
      throw new Error('multiplierStage produced an invalid factor.');
    }
    accumulator.multiplier *= factor;
  };
}

export function ceilingStage<TContext>(max: number): RateStage<TContext> {
  if (!Number.isFinite(max)) {
    throw new Error('ceilingStage requires a finite bound.');
  }
  return (_context, accumulator) => {
    accumulator.ceiling = Math.min(accumulator.ceiling, max);
  };
}

export const CERTAINTY = 1;
