/**
 * Upper bound on how many stations a single tool call may plan.
 */

export const MAX_PLANNED_STATIONS = 10_000;

/**
 * Throw when `planSpanPositions(span, stationCount, maxSegmentLength)`
 * could return more than MAX_PLANNED_STATIONS positions.
 */
export function assertStationBudget(span: number, stationCount: number, maxSegmentLength: number): void {
  const uniform = Math.max(2, Math.trunc(stationCount) || 0);
  const refined = maxSegmentLength > 0 ? Math.ceil(Math.abs(span) / maxSegmentLength) : 0;
  const bound = uniform + refined;
  if (!(bound <= MAX_PLANNED_STATIONS)) {
    throw new Error(
      `Station plan too large: span ${span}, station count ${stationCount}, max segment length ${maxSegmentLength} ` +
      `allow up to ${bound} stations (limit ${MAX_PLANNED_STATIONS}). Raise max_segment_length or lower station_count.`
    );
  }
}
