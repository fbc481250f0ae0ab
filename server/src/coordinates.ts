// ── Coordinate input validation ──────────────────────────────────────────────
//
// Raw inputs arrive as whatever the caller typed: empty, malformed or out of
// range. Any of those makes the point absent (undefined); nothing is clamped
// and NaN never leaves this module.

import { z } from "zod";
import type { LatLng } from "./geo-math.js";

export type Coordinate = LatLng;

export type RawCoordinateValue = string | number | null | undefined;

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const LatitudeSchema = z.number().min(-90).max(90);
export const LongitudeSchema = z.number().min(-180).max(180);

const CoordinateSchema = z.object({
  lat: LatitudeSchema,
  lng: LongitudeSchema,
});

/** Parse a raw latitude or longitude. Returns NaN for anything that is not a decimal number. */
export function parseCoordinateValue(raw: RawCoordinateValue): number {
  if (typeof raw === "number") return raw;
  if (raw == null) return NaN;
  const trimmed = raw.trim();
  return DECIMAL.test(trimmed) ? parseFloat(trimmed) : NaN;
}

/** Validate a numeric pair. Returns undefined for NaN, infinite or out-of-range components. */
export function toCoordinate(lat: number, lng: number): Coordinate | undefined {
  const result = CoordinateSchema.safeParse({ lat, lng });
  return result.success ? result.data : undefined;
}

export function parseCoordinate(rawLat: RawCoordinateValue, rawLng: RawCoordinateValue): Coordinate | undefined {
  return toCoordinate(parseCoordinateValue(rawLat), parseCoordinateValue(rawLng));
}
