import { describe, it, expect } from 'vitest';
import { computeFunnelRates, formatRate, percentage, roundTo } from './funnel-helpers.js';

describe('funnel-helpers', () => {
  it('should round percentages to two decimals', () => {
    expect(percentage(1, 3)).toBe(33.33);
    expect(percentage(2, 3)).toBe(66.67);
    expect(roundTo(12.3456, 1)).toBe(12.3);
  });

  it('should return null for a zero denominator', () => {
    expect(percentage(0, 0)).toBeNull();
    expect(percentage(5, 0)).toBeNull();
  });

  it('should compute step and overall rates with drop-offs', () => {
    const rates = computeFunnelRates([
      { label: 'All Sessions', count: 100 },
      { label: 'Viewed Category', count: 60 },
      { label: 'Viewed Product', count: 30 },
      { label: 'Viewed Price', count: 0 },
    ]);

    expect(rates).toEqual([
      {
        label: 'All Sessions',
        count: 100,
        step_conversion_rate: 100,
        overall_conversion_rate: 100,
        drop_off: 0,
      },
      {
        label: 'Viewed Category',
        count: 60,
        step_conversion_rate: 60,
        overall_conversion_rate: 60,
        drop_off: 40,
      },
      {
        label: 'Viewed Product',
        count: 30,
        step_conversion_rate: 50,
        overall_conversion_rate: 30,
        drop_off: 30,
      },
      {
        label: 'Viewed Price',
        count: 0,
        step_conversion_rate: 0,
        overall_conversion_rate: 0,
        drop_off: 30,
      },
    ]);
  });

  it('should yield null rates for an empty funnel', () => {
    const rates = computeFunnelRates([
      { label: 'All Sessions', count: 0 },
      { label: 'Viewed Category', count: 0 },
    ]);

    expect(rates.map((step) => step.step_conversion_rate)).toEqual([null, null]);
    expect(rates.map((step) => step.overall_conversion_rate)).toEqual([null, null]);
  });

  it('should format rates for display', () => {
    expect(formatRate(12.5)).toBe('12.50%');
    expect(formatRate(null)).toBe('n/a');
  });
});
