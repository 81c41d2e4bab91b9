/**
 * Funnel rate calculations shared by the conversion funnel and the funnel chart
 */

export interface FunnelStepCount {
  label: string;
  count: number;
}

export interface FunnelStepRates extends FunnelStepCount {
  /** count / previous step count x 100 */
  step_conversion_rate: number | null;
  /** count / first step count x 100 */
  overall_conversion_rate: number | null;
  /** Sessions lost since the previous step */
  drop_off: number;
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Percentage rounded to two decimals; null when the denominator is zero
 */
export function percentage(numerator: number, denominator: number): number | null {
  if (denominator <= 0) return null;
  return roundTo((numerator / denominator) * 100);
}

export function computeFunnelRates(steps: FunnelStepCount[]): FunnelStepRates[] {
  const first = steps[0]?.count ?? 0;

  return steps.map((step, index) => {
    const previous = index === 0 ? step.count : (steps[index - 1]?.count ?? 0);
    return {
      label: step.label,
      count: step.count,
      step_conversion_rate: percentage(step.count, previous),
      overall_conversion_rate: percentage(step.count, first),
      drop_off: index === 0 ? 0 : previous - step.count,
    };
  });
}

export function formatRate(rate: number | null): string {
  return rate === null ? 'n/a' : `${rate.toFixed(2)}%`;
}
