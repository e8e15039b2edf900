#!/usr/bin/env node
import path from "path";
import { promises as fs } from "fs";
import { parseArgs } from "util";
import config from "./config/config";
import logger from "./utils/logger";
import { ExportService } from "./services/export-service";
import { OppositionScraper } from "./services/opposition-scraper";
import { TTABVUE_LAYOUT } from "./services/ttabvue-layout";

const USAGE = "Usage: opposition-scraper <proceeding-number> [--type OPP]";

export interface CliDependencies {
  scraper: OppositionScraper;
  exporter: ExportService;
  outputDir: string;
  write: (text: string) => void;
}

/**
 * Scrapes one opposition and writes its workbook and JSON next to each
 * other. Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      type: { type: "string", short: "t", default: TTABVUE_LAYOUT.oppositionType },
    },
    allowPositionals: true,
  });

  const oppositionNumber = positionals[0];
  if (!oppositionNumber || !/^\d+$/.test(oppositionNumber)) {
    deps.write(USAGE);
    return 1;
  }

  const proceedingType = (values.type ?? TTABVUE_LAYOUT.oppositionType).toUpperCase();
  const record = await deps.scraper.scrapeOpposition(
    oppositionNumber,
    proceedingType,
    (progress, message) => logger.info(message, { oppositionNumber, progress })
  );

  if (record.marks.length === 0) {
    deps.write(`No pleaded applications found for ${oppositionNumber}`);
    return 1;
  }

  await fs.mkdir(deps.outputDir, { recursive: true });

  const workbook = deps.exporter.generateOppositionWorkbook(record);
  const workbookPath = path.join(deps.outputDir, workbook.fileName);
  await fs.writeFile(workbookPath, workbook.buffer);

  const jsonPath = path.join(deps.outputDir, `opposition_${oppositionNumber}_classes.json`);
  await fs.writeFile(jsonPath, deps.exporter.toJson(record));

  deps.write(`Excel file: ${workbookPath}`);
  deps.write(`JSON file: ${jsonPath}`);
  deps.write(`Unique US Classes: ${record.uniqueUsClasses.join(", ")}`);
  deps.write(
    `Unique International Classes: ${record.uniqueInternationalClasses.join(", ")}`
  );
  if (record.failedSerials.length > 0) {
    deps.write(`Failed serial numbers: ${record.failedSerials.length}`);
  }
  deps.write(deps.exporter.summaryRow(record));
  return 0;
}

async function main(): Promise<number> {
  const scraper = new OppositionScraper();
  try {
    return await runCli(process.argv.slice(2), {
      scraper,
      exporter: ExportService.getInstance(),
      outputDir: config.get("outputDir"),
      write: (text) => process.stdout.write(`${text}\n`),
    });
  } finally {
    await scraper.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("Scrape failed", error instanceof Error ? error : undefined);
      process.exitCode = 1;
    });
}
