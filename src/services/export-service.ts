import * as XLSX from "xlsx";
import logger from "../utils/logger";
import { AppError } from "../types/global-interface";
import {
  BatchAnalysisResult,
  BatchScrapeResult,
  MARK_TYPE_LABELS,
  OppositionRecord,
  Outcome,
  PleadedMark,
  TrademarkClass,
} from "../types/opposition-interface";

export interface ExportFile {
  buffer: Buffer;
  fileName: string;
}

type SheetRow = Record<string, string | number>;

const MARK_COLUMNS = [
  "Serial Number",
  "Mark Name",
  "Owner",
  "Filing Date",
  "Mark Type",
  "Mark Type Label",
  "US Classes",
  "International Classes",
  "Description",
  "Error",
];

const ANALYSIS_COLUMNS = [
  "GVKEY",
  "Company",
  "Alt Name",
  "Plaintiff",
  "Marks",
  "US GS",
  "INT GS",
  "Opp Start Date",
  "Opp End Date",
  "Result",
  "TM Type 1",
  "TM Type 2",
  "TM Type 3",
];

const codes = (classes: TrademarkClass[]): string =>
  classes.map((trademarkClass) => trademarkClass.code).join(", ");

/** 1 sustained, 0 dismissed, NA while pending. */
export function outcomeCode(outcome: Outcome): string {
  switch (outcome) {
    case "sustained":
      return "1";
    case "dismissed":
      return "0";
    case "pending":
      return "NA";
  }
}

function markRow(mark: PleadedMark): SheetRow {
  return {
    "Serial Number": mark.serialNumber,
    "Mark Name": mark.markName,
    Owner: mark.ownerSide,
    "Filing Date": mark.classes.filingDate,
    "Mark Type": mark.markType,
    "Mark Type Label": MARK_TYPE_LABELS[mark.markType],
    "US Classes": codes(mark.classes.usClasses),
    "International Classes": codes(mark.classes.internationalClasses),
    Description: mark.classes.description,
    Error: mark.error ?? "",
  };
}

const summaryRows = (metrics: Array<[string, string | number]>): SheetRow[] =>
  metrics.map(([metric, value]) => ({ Metric: metric, Value: value }));

function toBuffer(workbook: XLSX.WorkBook): Buffer {
  const buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return Buffer.from(buffer);
}

export class ExportService {
  private static instance: ExportService;

  public static getInstance(): ExportService {
    if (!ExportService.instance) {
      ExportService.instance = new ExportService();
    }
    return ExportService.instance;
  }

  public generateOppositionWorkbook(record: OppositionRecord): ExportFile {
    const rows = record.marks.map((mark) => ({
      "Opposition Number": record.oppositionNumber,
      ...markRow(mark),
    }));

    const summary = summaryRows([
      ["Opposition Number", record.oppositionNumber],
      ["Plaintiff", record.parties.plaintiffName ?? ""],
      ["Defendant", record.parties.defendantName ?? ""],
      ["Total Serial Numbers", record.marks.length],
      ["Unique US Classes", record.uniqueUsClasses.join(", ")],
      ["Total US Classes Count", record.totalUsClasses],
      ["Unique International Classes", record.uniqueInternationalClasses.join(", ")],
      ["Total International Classes Count", record.totalInternationalClasses],
      ["Filing Date", record.timeline.filingDate ?? ""],
      ["Termination Date", record.timeline.terminationDate ?? ""],
      ["Result", outcomeCode(record.timeline.outcome)],
      ["Failed Serial Numbers", record.failedSerials.length],
    ]);

    return this.writeWorkbook(
      [
        { name: "Trademark Classes", rows, header: ["Opposition Number", ...MARK_COLUMNS] },
        { name: "Summary", rows: summary, header: ["Metric", "Value"] },
      ],
      `opposition_${record.oppositionNumber}_classes.xlsx`
    );
  }

  public generateBatchWorkbook(result: BatchScrapeResult): ExportFile {
    const filingDates = new Map(
      result.listings.map((listing) => [listing.proceedingNumber, listing.filingDate ?? ""])
    );

    const rows = result.records.flatMap((record) =>
      record.marks.map((mark) => ({
        "Proceeding Number": record.oppositionNumber,
        "Proceeding Filing Date": filingDates.get(record.oppositionNumber) ?? "",
        ...markRow(mark),
      }))
    );

    const summary = summaryRows([
      ["Source", result.source],
      ["Total Oppositions", result.records.length],
      ["Failed Oppositions", result.failures.length],
      ["Total Serial Numbers", result.totalSerialCount],
      ["Unique US Classes", result.uniqueUsClasses.join(", ")],
      ["Total US Classes Count", result.totalUsClasses],
      ["Unique International Classes", result.uniqueInternationalClasses.join(", ")],
      ["Total International Classes Count", result.totalInternationalClasses],
    ]);

    return this.writeWorkbook(
      [
        {
          name: "Trademark Classes",
          rows,
          header: ["Proceeding Number", "Proceeding Filing Date", ...MARK_COLUMNS],
        },
        { name: "Summary", rows: summary, header: ["Metric", "Value"] },
      ],
      `oppositions_${this.timestamp()}.xlsx`
    );
  }

  /** One row per opposition, serial/trademark pairs padded to the widest one. */
  public generateAnalysisWorkbook(result: BatchAnalysisResult): ExportFile {
    const widest = Math.max(0, ...result.analyses.map((a) => a.markDetails.length));
    const markColumns = Array.from({ length: widest }, (_, i) => [
      `Serial No ${i + 1}`,
      `Trademark ${i + 1}`,
    ]).flat();

    const rows = result.analyses.map((analysis) => {
      const row: SheetRow = {
        GVKEY: analysis.gvkey ?? "",
        Company: analysis.companyName,
        "Alt Name": analysis.altName ?? "",
        Plaintiff: analysis.plaintiff,
        Marks: analysis.marks,
        "US GS": analysis.usClassCount,
        "INT GS": analysis.internationalClassCount,
        "Opp Start Date": analysis.startDate ?? "",
        "Opp End Date": analysis.endDate ?? "",
        Result: outcomeCode(analysis.outcome),
        "TM Type 1": analysis.tmTypeCounts.standard,
        "TM Type 2": analysis.tmTypeCounts.stylized,
        "TM Type 3": analysis.tmTypeCounts.slogan,
      };
      for (let i = 0; i < widest; i++) {
        const detail = analysis.markDetails[i];
        row[`Serial No ${i + 1}`] = detail?.serialNumber ?? "";
        row[`Trademark ${i + 1}`] = detail?.markName ?? "";
      }
      return row;
    });

    return this.writeWorkbook(
      [{ name: "Opposition Analysis", rows, header: [...ANALYSIS_COLUMNS, ...markColumns] }],
      `opposition_analysis_${this.timestamp()}.xlsx`
    );
  }

  public toJson(record: OppositionRecord): string {
    return JSON.stringify(record, null, 2);
  }

  /**
   * Tab-separated row for pasting into a spreadsheet: counts, dates and
   * result, then a mark type / serial pair per mark.
   */
  public summaryRow(record: OppositionRecord): string {
    return [
      String(record.marks.length),
      String(record.totalUsClasses),
      String(record.totalInternationalClasses),
      record.timeline.filingDate ?? "",
      record.timeline.terminationDate ?? "",
      outcomeCode(record.timeline.outcome),
      ...record.marks.flatMap((mark) => [String(mark.markType), mark.serialNumber]),
    ].join("\t");
  }

  private writeWorkbook(
    sheets: Array<{ name: string; rows: SheetRow[]; header: string[] }>,
    fileName: string
  ): ExportFile {
    try {
      const workbook = XLSX.utils.book_new();
      for (const sheet of sheets) {
        const worksheet = XLSX.utils.json_to_sheet(sheet.rows, { header: sheet.header });
        worksheet["!cols"] = sheet.header.map((column) => ({
          wch: Math.max(12, column.length + 2),
        }));
        XLSX.utils.book_append_sheet(workbook, worksheet, sheet.name);
      }

      const buffer = toBuffer(workbook);
      logger.info("Generated workbook", {
        action: "excel_generate_complete",
        fileName,
        dataLength: buffer.length,
      });
      return { buffer, fileName };
    } catch (error) {
      logger.error("Failed to generate workbook", error instanceof Error ? error : undefined, {
        fileName,
      });
      throw new AppError(
        `Failed to generate workbook: ${error instanceof Error ? error.message : String(error)}`,
        500,
        "EXCEL_GENERATION_ERROR"
      );
    }
  }

  private timestamp(): string {
    return new Date().toISOString().slice(0, 19).replace(/[:.]/g, "-");
  }
}

export default ExportService;
