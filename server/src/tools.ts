// ── MCP tool handlers ────────────────────────────────────────────────────────
//
// Each handler is one pure engine call formatted as MCP text content.
// Registration and input schemas live in server.ts.

import { geodesicIntermediatePoints, geodesicInverse } from "./geo-math.js";
import { computeRouteView } from "./route.js";
import { routeViewToGeoJson } from "./geojson.js";

export function text(msg: string) {
  return { content: [{ type: "text" as const, text: msg }] };
}

export type ToolResult = ReturnType<typeof text>;

export type RouteFormat = "summary" | "geojson";

export interface RouteToolArgs {
  startLat?: string;
  startLng?: string;
  destLat?: string;
  destLng?: string;
  format: RouteFormat;
}

export interface InverseToolArgs {
  fromLat: number;
  fromLng: number;
  toLat: number;
  toLng: number;
}

export interface PointsToolArgs extends InverseToolArgs {
  count: number;
}

const fmt = (n: number) => n.toFixed(6);

// 1. geo_route
export function routeTool({ startLat, startLng, destLat, destLng, format }: RouteToolArgs): ToolResult {
  try {
    const view = computeRouteView(startLat, startLng, destLat, destLng);
    if (view.route && !view.route.converged) {
      console.error(
        `Inverse geodesic did not converge for ${startLat},${startLng} -> ${destLat},${destLng}; using spherical solution`,
      );
    }
    if (format === "geojson") return text(JSON.stringify(routeViewToGeoJson(view)));

    const lines = [view.summaryText];
    if (view.startMarker) lines.push(`  ${view.startMarker.popup}`);
    if (view.destMarker) lines.push(`  ${view.destMarker.popup}`);
    if (view.displayBounds) {
      const [[minLat, minLng], [maxLat, maxLng]] = view.displayBounds;
      lines.push(`  Bounds: [${minLat}, ${minLng}] to [${maxLat}, ${maxLng}]`);
    }
    if (view.path) lines.push(`  Path: ${view.path.length} points`);
    return text(lines.join("\n"));
  } catch (err) {
    console.error("geo_route failed:", err instanceof Error ? err.message : err);
    return text(`Error: ${(err as Error).message}`);
  }
}

// 2. geo_inverse
export function inverseTool({ fromLat, fromLng, toLat, toLng }: InverseToolArgs): ToolResult {
  try {
    const inv = geodesicInverse(fromLat, fromLng, toLat, toLng);
    const lines = [
      `Distance: ${inv.distanceMeters.toFixed(3)} m (${(inv.distanceMeters / 1000).toFixed(3)} km)`,
      `Initial bearing: ${fmt(inv.initialBearing)}°`,
      `Back azimuth: ${fmt(inv.backAzimuth)}°`,
    ];
    if (!inv.converged) {
      console.error(`Inverse geodesic did not converge for ${fromLat},${fromLng} -> ${toLat},${toLng}`);
      lines.push("  Note: nearly antipodal points; spherical approximation used.");
    }
    return text(lines.join("\n"));
  } catch (err) {
    console.error("geo_inverse failed:", err instanceof Error ? err.message : err);
    return text(`Error: ${(err as Error).message}`);
  }
}

// 3. geo_intermediate_points
export function pointsTool({ fromLat, fromLng, toLat, toLng, count }: PointsToolArgs): ToolResult {
  try {
    const points = geodesicIntermediatePoints(fromLat, fromLng, toLat, toLng, count);
    return text(JSON.stringify(points));
  } catch (err) {
    console.error("geo_intermediate_points failed:", err instanceof Error ? err.message : err);
    return text(`Error: ${(err as Error).message}`);
  }
}
