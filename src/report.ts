import "reflect-metadata";
import { container } from "tsyringe";
import { IShapeDocumentReader } from "./adapters/kml/kml-adapter.interface";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IReportWriter } from "./services/report-writer.interface";
import { IZoneReportService } from "./services/zone-report.interface";
import { isNotFound, isSuccess } from "./types/result.types";

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    // Optional overrides: report.ts <input.kml> <output.csv>
    const [inputArg, outputArg] = process.argv.slice(2);
    const inputPath = inputArg || config.data.reportInputPath;
    const outputPath = outputArg || config.data.reportOutputPath;

    const documentReader = container.resolve<IShapeDocumentReader>("IShapeDocumentReader");
    const reportService = container.resolve<IZoneReportService>("IZoneReportService");
    const reportWriter = container.resolve<IReportWriter>("IReportWriter");

    const readResult = await documentReader.readShapes(inputPath);
    if (!isSuccess(readResult)) {
      if (isNotFound(readResult)) {
        console.log(readResult.message);
        process.exit(0);
      }
      console.error(readResult.message);
      process.exit(1);
    }

    const report = reportService.buildReport(readResult.data);
    for (const error of report.errors) {
      console.warn(`${error.zoneName}: ${error.errorType}: ${error.message}`);
    }

    await reportWriter.writeReport(outputPath, report.entries);
    console.log(`Report saved: ${outputPath}`);
    console.log(`Total zones processed: ${report.entries.length}`);

    process.exit(0);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

void main();
