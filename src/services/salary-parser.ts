import type { SalarySummary } from '../core/types.js';

const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

/**
 * Parse a free-form salary string into absolute figures, in the order they
 * appear: "$100k - $150k" -> [100000, 150000], "$80,000-$120,000" -> [80000, 120000].
 *
 * A "k" anywhere in the text scales every figure below 1000 by 1000. The rule
 * is string-wide, so "$100k bonus, $85 per hour" scales both numbers.
 */
export function parseSalary(text: string): number[] {
  if (!text) {
    return [];
  }

  const normalized = text.toLowerCase().replace(/,/g, '');
  const hasThousandsSuffix = normalized.includes('k');

  const values: number[] = [];
  for (const match of normalized.matchAll(NUMBER_PATTERN)) {
    const value = parseFloat(match[0]);
    values.push(hasThousandsSuffix && value < 1000 ? value * 1000 : value);
  }
  return values;
}

/**
 * Min/max over a pool of parsed figures; zeros when the pool is empty
 */
export function summarizeSalaries(values: readonly number[], currency: string): SalarySummary {
  if (values.length === 0) {
    return { min: 0, max: 0, currency };
  }

  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max, currency };
}
