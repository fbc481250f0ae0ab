import { describe, test, expect, vi, beforeEach, afterAll } from "vitest";
import { inverseTool, pointsTool, routeTool } from "../tools.js";
import { expectCloseTo } from "./test-utils.js";

const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

beforeEach(() => {
  errorSpy.mockClear();
});

afterAll(() => {
  errorSpy.mockRestore();
});

const textOf = (res: { content: { text: string }[] }) => res.content.map((c) => c.text).join("");

// ── geo_route ───────────────────────────────────────────────────────────────

describe("routeTool", () => {
  test("summary format with both points", () => {
    const res = routeTool({ startLat: "0", startLng: "0", destLat: "0", destLng: "1", format: "summary" });
    expect(textOf(res)).toBe(
      "Distance: 111.319 km\n" +
        "Azimuth (Start → Dest): 90.0° (clockwise from true North)\n" +
        "  Start: 0.000, 0.000\n" +
        "  Dest: 0.000, 1.000\n" +
        "  Bounds: [0, 0] to [0, 1]\n" +
        "  Path: 1026 points",
    );
  });

  test("summary format with only a start point", () => {
    const res = routeTool({ startLat: "1.3521", startLng: "103.8198", format: "summary" });
    expect(textOf(res)).toBe(
      "Enter both Start and Destination coordinates to compute distance and azimuth.\n" +
        "  Start: 1.352, 103.820",
    );
  });

  test("geojson format", () => {
    const res = routeTool({ startLat: "0", startLng: "170", destLat: "0", destLng: "-170", format: "geojson" });
    const fc = JSON.parse(textOf(res)) as { type: string; features: unknown[] };
    expect(fc.type).toBe("FeatureCollection");
    expect(fc.features).toHaveLength(3);
  });

  test("logs when the spherical fallback is used", () => {
    routeTool({ startLat: "0", startLng: "0", destLat: "0", destLng: "180", format: "summary" });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test("no log for a converged route", () => {
    routeTool({ startLat: "0", startLng: "0", destLat: "0", destLng: "1", format: "summary" });
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

// ── geo_inverse ─────────────────────────────────────────────────────────────

describe("inverseTool", () => {
  test("equatorial degree", () => {
    const res = inverseTool({ fromLat: 0, fromLng: 0, toLat: 0, toLng: 1 });
    expect(textOf(res)).toBe(
      "Distance: 111319.491 m (111.319 km)\nInitial bearing: 90.000000°\nBack azimuth: 270.000000°",
    );
  });

  test("antipodal points note the approximation", () => {
    const res = inverseTool({ fromLat: 0, fromLng: 0, toLat: 0, toLng: 180 });
    expect(textOf(res).split("\n").at(-1)).toBe("  Note: nearly antipodal points; spherical approximation used.");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

// ── geo_intermediate_points ─────────────────────────────────────────────────

describe("pointsTool", () => {
  test("returns the requested number of points as JSON", () => {
    const res = pointsTool({ fromLat: 0, fromLng: 0, toLat: 0, toLng: 10, count: 1 });
    const points = JSON.parse(textOf(res)) as { lat: number; lng: number }[];
    expect(points).toHaveLength(1);
    expectCloseTo(points[0]!.lat, 0, 1e-9);
    expectCloseTo(points[0]!.lng, 5, 1e-9);
  });
});
