import "reflect-metadata";
import { container } from "tsyringe";
import { IShapeDocumentWriter } from "./adapters/kml/kml-adapter.interface";
import { IZoneRecordAdapter } from "./adapters/zones/zone-adapter.interface";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IZoneConverter } from "./services/zone-converter.interface";
import { isSuccess } from "./types/result.types";

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    const zoneAdapter = container.resolve<IZoneRecordAdapter>("IZoneRecordAdapter");
    const zoneConverter = container.resolve<IZoneConverter>("IZoneConverter");
    const documentWriter = container.resolve<IShapeDocumentWriter>("IShapeDocumentWriter");

    const loadResult = await zoneAdapter.loadZones();
    if (!isSuccess(loadResult)) {
      console.error(loadResult.message);
      process.exit(1);
    }

    const { zones, skipped, invalid } = loadResult.data;
    console.log(
      `Processing ${zones.length} zones from ${config.data.zonesPath} (${skipped} skipped, ${invalid} invalid)...`,
    );

    const conversion = zoneConverter.convertZones(zones);

    await documentWriter.writeDocument(config.data.kmlOutputPath, conversion.placemarks);
    console.log(
      `KML file generated - ${conversion.succeeded} zones processed, ${conversion.failed} zones failed`,
    );

    process.exit(0);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

void main();
