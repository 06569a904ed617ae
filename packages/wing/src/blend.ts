import type { Point2, Profile } from './profile.js';

export function clamp01(t: number): number {
  return Math.max(0, Math.min(1, t));
}

/**
 * Point-by-point linear blend from `a` (t=0) to `b` (t=1).
 * `t` is clamped to [0, 1]. Profiles are paired by index; the result has
 * the length of the shorter input.
 */
export function blendProfiles(a: Profile, b: Profile, t: number): Point2[] {
  const k = clamp01(t);
  const n = Math.min(a.length, b.length);
  const out: Point2[] = [];
  for (let i = 0; i < n; i++) {
    const [ax, ay] = a[i];
    const [bx, by] = b[i];
    out.push([ax + (bx - ax) * k, ay + (by - ay) * k]);
  }
  return out;
}
