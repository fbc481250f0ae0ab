// ── Antimeridian unwrapping ──────────────────────────────────────────────────
//
// Geodesic longitudes come back in (-180, 180]. A flat map needs one
// continuous line, so a route crossing ±180° is shifted onto the far side:
// eastward crossings go up to +360, westward ones down to -360. A route
// running along ±180° keeps one sign throughout.
// Display coordinates only; never feed them back into geo-math.

import type { Coordinate } from "./coordinates.js";

export type CrossingDirection = "east" | "west";

/** Direction in which a route from startLng to destLng crosses the antimeridian, if it does. */
export function antimeridianCrossing(startLng: number, destLng: number): CrossingDirection | undefined {
  const delta = destLng - startLng;
  if (delta < -180) return "east";
  if (delta > 180) return "west";
  return undefined;
}

export function crossesAntimeridian(startLng: number, destLng: number): boolean {
  return antimeridianCrossing(startLng, destLng) !== undefined;
}

/**
 * Shift longitudes so the path runs without a jump: each point moves by the
 * multiple of 360 that keeps it within 180° of the point before it. The first
 * point is kept as is. For a route whose endpoints cross the antimeridian this
 * puts the destination at destLng ± 360; otherwise it stays where it was.
 * Returns new points.
 */
export function unwrapLongitudes(path: readonly Coordinate[]): Coordinate[] {
  const out: Coordinate[] = [];
  let previous: number | undefined;
  for (const { lat, lng } of path) {
    let shifted = lng;
    if (previous !== undefined) {
      while (shifted - previous > 180) shifted -= 360;
      while (shifted - previous < -180) shifted += 360;
    }
    out.push({ lat, lng: shifted });
    previous = shifted;
  }
  return out;
}
