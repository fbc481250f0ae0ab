// ── Route computation ────────────────────────────────────────────────────────
//
// Turns four raw inputs into everything a map needs: markers, the geodesic
// polyline, a viewport hint and a one-line-per-fact summary. Pure; call it on
// every input change.

import { DEFAULT_SAMPLE_COUNT, geodesicInverse, pointsAlongGeodesic } from "./geo-math.js";
import { crossesAntimeridian, unwrapLongitudes } from "./antimeridian.js";
import { parseCoordinate } from "./coordinates.js";
import type { Coordinate, RawCoordinateValue } from "./coordinates.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** [[minLat, minLng], [maxLat, maxLng]], the shape map libraries fit a viewport to. */
export type LatLngBounds = [[number, number], [number, number]];

export interface RouteResult {
  /** Start and destination exactly as entered (geodesy-true). */
  start: Coordinate;
  destination: Coordinate;
  distanceMeters: number;
  /** Forward azimuth at the start, degrees clockwise from true north, 0-360. */
  initialBearingDegrees: number;
  /** Bearing from the destination back toward the start, 0-360. */
  backAzimuthDegrees: number;
  /** False when the solver fell back to the spherical solution. */
  converged: boolean;
  /** True when the endpoint longitudes are more than 180° apart. */
  crossesAntimeridian: boolean;
  /** Start, samples and destination, unwrapped for display. */
  path: Coordinate[];
  displayBounds: LatLngBounds;
}

export interface Marker {
  /** Display position (may be unwrapped past ±180°). */
  position: Coordinate;
  label: string;
  popup: string;
}

export interface RouteView {
  startMarker?: Marker;
  destMarker?: Marker;
  path?: Coordinate[];
  summaryText: string;
  displayBounds?: LatLngBounds;
  route?: RouteResult;
}

export const ROUTE_PROMPT = "Enter both Start and Destination coordinates to compute distance and azimuth.";

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Viewport hint from the raw endpoints. A route across ±180° may extend past it. */
export function computeBounds(start: Coordinate, destination: Coordinate): LatLngBounds {
  return [
    [Math.min(start.lat, destination.lat), Math.min(start.lng, destination.lng)],
    [Math.max(start.lat, destination.lat), Math.max(start.lng, destination.lng)],
  ];
}

export function computeRoute(start: Coordinate, destination: Coordinate): RouteResult {
  const inverse = geodesicInverse(start.lat, start.lng, destination.lat, destination.lng);
  const samples = pointsAlongGeodesic(start.lat, start.lng, inverse, DEFAULT_SAMPLE_COUNT);

  return {
    start,
    destination,
    distanceMeters: inverse.distanceMeters,
    initialBearingDegrees: inverse.initialBearing,
    backAzimuthDegrees: inverse.backAzimuth,
    converged: inverse.converged,
    crossesAntimeridian: crossesAntimeridian(start.lng, destination.lng),
    path: unwrapLongitudes([start, ...samples, destination]),
    displayBounds: computeBounds(start, destination),
  };
}

export function formatRouteSummary(route: RouteResult): string {
  const km = (route.distanceMeters / 1000).toFixed(3);
  const az = route.initialBearingDegrees.toFixed(1);
  return `Distance: ${km} km\nAzimuth (Start → Dest): ${az}° (clockwise from true North)`;
}

function marker(label: string, popupPrefix: string, coord: Coordinate, position: Coordinate = coord): Marker {
  return {
    position,
    label,
    popup: `${popupPrefix}: ${coord.lat.toFixed(3)}, ${coord.lng.toFixed(3)}`,
  };
}

// ── Entry point ──────────────────────────────────────────────────────────────

/**
 * Everything a map view shows for four raw inputs. A point that fails to
 * parse or is out of range contributes nothing; unless both are valid, the
 * summary is the fixed prompt.
 */
export function computeRouteView(
  startLat: RawCoordinateValue,
  startLng: RawCoordinateValue,
  destLat: RawCoordinateValue,
  destLng: RawCoordinateValue,
): RouteView {
  const start = parseCoordinate(startLat, startLng);
  const destination = parseCoordinate(destLat, destLng);

  if (!start || !destination) {
    return {
      startMarker: start && marker("Start", "Start", start),
      destMarker: destination && marker("Destination", "Dest", destination),
      summaryText: ROUTE_PROMPT,
    };
  }

  const route = computeRoute(start, destination);
  const first = route.path[0] ?? start;
  const last = route.path[route.path.length - 1] ?? destination;

  return {
    startMarker: marker("Start", "Start", start, first),
    destMarker: marker("Destination", "Dest", destination, last),
    path: route.path,
    summaryText: formatRouteSummary(route),
    displayBounds: route.displayBounds,
    route,
  };
}
