/**
 * Piecewise-linear calibration curves for the quality sub-scores.
 *
 * Each curve is a list of (x, y) points in ascending x. Values outside the
 * range clamp to the first/last y.
 */

export type CurvePoint = readonly [x: number, y: number];
export type Curve = readonly CurvePoint[];

export function piecewiseLinear(x: number, points: Curve): number {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) return 0;

  if (x <= first[0]) return first[1];
  if (x >= last[0]) return last[1];

  for (let i = 0; i < points.length - 1; i++) {
    const [x0, y0] = points[i];
    const [x1, y1] = points[i + 1];
    if (x0 <= x && x <= x1) {
      const t = (x - x0) / (x1 - x0);
      return y0 + t * (y1 - y0);
    }
  }
  return last[1];
}

/** Words per page. Peaks in the 600 range typical of letters, falls off when suspiciously dense. */
export const DENSITY_CURVE: Curve = [
  [0, 0.0],
  [20, 0.05],
  [50, 0.3],
  [100, 0.6],
  [200, 0.95],
  [600, 1.0],
  [800, 0.85],
  [1200, 0.6],
];

/** Alphabetic characters over printable non-space characters */
export const CHAR_CURVE: Curve = [
  [0.3, 0.0],
  [0.5, 0.15],
  [0.65, 0.4],
  [0.75, 0.65],
  [0.85, 0.9],
  [0.93, 1.0],
];

/** Fraction of words that pass the structural checks */
export const WORD_CURVE: Curve = [
  [0.5, 0.0],
  [0.7, 0.2],
  [0.85, 0.5],
  [0.93, 0.75],
  [0.97, 0.9],
  [1.0, 1.0],
];

/** Fraction of sampled words found in the reference word list */
export const DICTIONARY_CURVE: Curve = [
  [0.4, 0.0],
  [0.55, 0.15],
  [0.65, 0.35],
  [0.75, 0.6],
  [0.85, 0.8],
  [0.92, 0.95],
  [1.0, 1.0],
];

export const QUALITY_WEIGHTS = {
  density: 0.15,
  char: 0.15,
  word: 0.15,
  dictionary: 0.4,
  content: 0.15,
} as const;

/** Density sub-score below which the whole score is scaled down */
export const DENSITY_GATE = 0.2;
