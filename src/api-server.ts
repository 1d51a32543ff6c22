import "reflect-metadata";
import express from "express";
import cors from "cors";
import { container } from "tsyringe";
import { z } from "zod";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ICoordinateExtractor } from "./services/coordinate-extractor.interface";
import { IZoneReportService } from "./services/zone-report.interface";
import { GeoSample } from "./types/domain.types";
import { parseCoordinateList } from "./utils/coordinate-list.util";
import { toDmsPair } from "./utils/dms.util";

const ParseRequestSchema = z.object({
  text: z.string().min(1, "text cannot be empty"),
});

const ClassifyRequestSchema = z.object({
  name: z.string().optional(),
  hint: z.enum(["polygon", "line"]).optional(),
  coordinates: z.union([
    z.string(),
    z.array(z.array(z.number()).min(2, "each coordinate needs longitude and latitude").max(3)),
  ]),
});

function toSamples(coordinates: string | number[][]): GeoSample[] {
  if (typeof coordinates === "string") {
    return parseCoordinateList(coordinates);
  }
  return coordinates.map(([longitude, latitude, altitude]) => ({
    longitude,
    latitude,
    altitude: altitude ?? 0,
  }));
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: "5mb" }));

// Initialize DI container (same as index.ts)
const config = loadConfig();
setupDI(config);

// POST /api/zones/parse - Extract geometry from a zone coordinate definition
app.post("/api/zones/parse", (req, res) => {
  const parsed = ParseRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: "Invalid request. text string is required.",
    });
  }

  const extractor = container.resolve<ICoordinateExtractor>("ICoordinateExtractor");
  const geometry = extractor.extract(parsed.data.text);

  res.json({
    success: geometry.kind !== "unparseable",
    geometry,
    vertices: geometry.ring.map(([longitude, latitude], i) => ({
      index: i + 1,
      ...toDmsPair(latitude, longitude),
    })),
  });
});

// POST /api/shapes/classify - Classify sampled shape coordinates
app.post("/api/shapes/classify", (req, res) => {
  const parsed = ClassifyRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: "Invalid request.",
      details: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  try {
    const reportService = container.resolve<IZoneReportService>("IZoneReportService");
    const report = reportService.buildReport([
      {
        name: parsed.data.name ?? "shape",
        hint: parsed.data.hint,
        samples: toSamples(parsed.data.coordinates),
      },
    ]);

    res.json({
      success: report.errors.length === 0,
      entry: report.entries[0],
      errors: report.errors,
    });
  } catch (error) {
    console.error("Classification error:", error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
});

// Health check endpoint
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.listen(config.apiPort, () => {
  console.log(`API Server running on http://localhost:${config.apiPort}`);
  console.log(`Health check: http://localhost:${config.apiPort}/health`);
});
