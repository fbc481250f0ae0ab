// ── GeoJSON export ───────────────────────────────────────────────────────────
//
// Serializes a RouteView for map clients. GeoJSON positions are [lng, lat],
// the reverse of the {lat, lng} objects used everywhere else.

import type { Coordinate } from "./coordinates.js";
import type { Marker, RouteView } from "./route.js";

export type Position = [number, number];

export interface PointFeature {
  type: "Feature";
  geometry: { type: "Point"; coordinates: Position };
  properties: { role: "start" | "destination"; label: string; popup: string };
}

export interface LineStringFeature {
  type: "Feature";
  geometry: { type: "LineString"; coordinates: Position[] };
  properties: { distanceMeters: number; initialBearing: number; backAzimuth: number };
}

export interface RouteFeatureCollection {
  type: "FeatureCollection";
  features: Array<PointFeature | LineStringFeature>;
}

const toPosition = ({ lat, lng }: Coordinate): Position => [lng, lat];

function pointFeature(marker: Marker, role: PointFeature["properties"]["role"]): PointFeature {
  return {
    type: "Feature",
    geometry: { type: "Point", coordinates: toPosition(marker.position) },
    properties: { role, label: marker.label, popup: marker.popup },
  };
}

export function routeViewToGeoJson(view: RouteView): RouteFeatureCollection {
  const features: RouteFeatureCollection["features"] = [];
  if (view.startMarker) features.push(pointFeature(view.startMarker, "start"));
  if (view.destMarker) features.push(pointFeature(view.destMarker, "destination"));
  if (view.route) {
    features.push({
      type: "Feature",
      geometry: { type: "LineString", coordinates: view.route.path.map(toPosition) },
      properties: {
        distanceMeters: view.route.distanceMeters,
        initialBearing: view.route.initialBearingDegrees,
        backAzimuth: view.route.backAzimuthDegrees,
      },
    });
  }
  return { type: "FeatureCollection", features };
}
