import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { LatitudeSchema, LongitudeSchema } from "./coordinates.js";
import { DEFAULT_SAMPLE_COUNT } from "./geo-math.js";
import { inverseTool, pointsTool, routeTool } from "./tools.js";

export const SERVER_INFO = {
  name: "geodesic-route-mcp",
  version: "0.1.0",
} as const;

const endpointShape = {
  fromLat: LatitudeSchema.describe("Start latitude (-90 to 90)"),
  fromLng: LongitudeSchema.describe("Start longitude (-180 to 180)"),
  toLat: LatitudeSchema.describe("Destination latitude (-90 to 90)"),
  toLng: LongitudeSchema.describe("Destination longitude (-180 to 180)"),
};

// ── MCP Server ──────────────────────────────────────────────────────────────

export function createServer(): McpServer {
  const server = new McpServer(SERVER_INFO);

  server.registerTool(
    "geo_route",
    {
      description:
        "Geodesic route between two points on the WGS84 ellipsoid: distance, azimuth, map markers, " +
        "viewport bounds and a 1026-point path unwrapped across the antimeridian. " +
        "Coordinates are raw text as typed; a point that is empty, malformed or out of range is left out.",
      inputSchema: {
        startLat: z.string().optional().describe("Start latitude as entered, e.g. '1.3521'"),
        startLng: z.string().optional().describe("Start longitude as entered, e.g. '103.8198'"),
        destLat: z.string().optional().describe("Destination latitude as entered, e.g. '35.6895'"),
        destLng: z.string().optional().describe("Destination longitude as entered, e.g. '139.6917'"),
        format: z
          .enum(["summary", "geojson"])
          .default("summary")
          .describe("'summary' for text, 'geojson' for a FeatureCollection with markers and the path"),
      },
    },
    async (args) => routeTool(args),
  );

  server.registerTool(
    "geo_inverse",
    {
      description: "Ellipsoidal (WGS84) distance, initial bearing and back azimuth between two points",
      inputSchema: endpointShape,
    },
    async (args) => inverseTool(args),
  );

  server.registerTool(
    "geo_intermediate_points",
    {
      description: "Evenly spaced points strictly between two endpoints along the WGS84 geodesic",
      inputSchema: {
        ...endpointShape,
        count: z.number().int().min(1).max(10_000).default(DEFAULT_SAMPLE_COUNT).describe("Number of points"),
      },
    },
    async (args) => pointsTool(args),
  );

  return server;
}
