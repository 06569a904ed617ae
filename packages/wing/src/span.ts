/**
 * Span Position Planner — where along the span the stations go.
 *
 *   planSpanPositions(600, 4)        →  [0, 200, 400, 600]
 *   planSpanPositions(600, 4, 150)   →  [0, 100, 200, 300, 400, 500, 600]
 */

/**
 * Uniform positions from 0 to `span` inclusive, `stationCount` of them
 * (truncated, at least 2). With `maxSegmentLength > 0` every uniform
 * segment longer than the limit is split into equal parts so no gap
 * exceeds it.
 */
export function planSpanPositions(span: number, stationCount: number, maxSegmentLength = 0): number[] {
  const n = Math.max(2, Math.trunc(stationCount) || 0);
  const uniform: number[] = [];
  for (let i = 0; i < n; i++) {
    uniform.push(i === n - 1 ? span : span * i / (n - 1));
  }
  if (!(maxSegmentLength > 0)) return uniform;

  const refined: number[] = [];
  for (let i = 0; i + 1 < n; i++) {
    const y0 = uniform[i];
    const y1 = uniform[i + 1];
    const parts = Math.max(1, Math.ceil((y1 - y0) / maxSegmentLength));
    for (let k = 0; k < parts; k++) {
      refined.push(y0 + (y1 - y0) * k / parts);
    }
  }
  refined.push(span);
  return refined;
}
