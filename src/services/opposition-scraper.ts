import config from "../config/config";
import logger from "../utils/logger";
import { sleep as defaultSleep } from "../utils/retry";
import { AppError } from "../types/global-interface";
import {
  BatchAnalysisResult,
  BatchScrapeResult,
  ClassRetrievalResult,
  DateRange,
  MarkType,
  OppositionAnalysis,
  OppositionFacts,
  OppositionRecord,
  PleadedMark,
  ProceedingFailure,
  ProceedingListing,
  ProgressCallback,
} from "../types/opposition-interface";
import { CaseStatusClient, emptyClassSet } from "./case-status-client";
import { parseProceedingDocument } from "./document-parser";
import { describeHttpError } from "./http-client";
import { MarkTypeService } from "./mark-type-service";
import { extractOppositionFacts } from "./opposition-extractor";
import { parsePartySearchResults, parseProceedingLinks } from "./proceeding-search";
import { ProceedingSource, TtabvueClient } from "./ttabvue-client";
import { TTABVUE_LAYOUT } from "./ttabvue-layout";

export interface ClassSource {
  fetchClasses(serialNumber: string): Promise<ClassRetrievalResult>;
}

export interface MarkTypeSource {
  classifyMark(serialNumber: string): Promise<MarkType>;
  close?(): Promise<void>;
}

export interface OppositionScraperOptions {
  proceedings?: ProceedingSource;
  classes?: ClassSource;
  markTypes?: MarkTypeSource;
  sleep?: (ms: number) => Promise<void>;
  interRequestDelayMs?: number;
  oppositionDelayMs?: number;
}

const uniqueSorted = (codes: Iterable<string>): string[] => [...new Set(codes)].sort();

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Assembles the record from page facts and per-mark lookups. Pure. */
export function buildOppositionRecord(
  oppositionNumber: string,
  proceedingType: string,
  facts: OppositionFacts,
  marks: PleadedMark[]
): OppositionRecord {
  const usCodes = marks.flatMap((mark) => mark.classes.usClasses.map((c) => c.code));
  const internationalCodes = marks.flatMap((mark) =>
    mark.classes.internationalClasses.map((c) => c.code)
  );

  const markTypeCounts: Record<MarkType, number> = {
    [MarkType.NoImage]: 0,
    [MarkType.StandardText]: 0,
    [MarkType.StylizedOrDesign]: 0,
    [MarkType.Slogan]: 0,
  };
  marks.forEach((mark) => markTypeCounts[mark.markType]++);

  return {
    oppositionNumber,
    proceedingType,
    parties: facts.parties,
    plaintiffSerials: marks
      .filter((mark) => mark.ownerSide === "plaintiff")
      .map((mark) => mark.serialNumber),
    defendantSerials: marks
      .filter((mark) => mark.ownerSide === "defendant")
      .map((mark) => mark.serialNumber),
    marks,
    timeline: facts.timeline,
    uniqueUsClasses: uniqueSorted(usCodes),
    uniqueInternationalClasses: uniqueSorted(internationalCodes),
    totalUsClasses: usCodes.length,
    totalInternationalClasses: internationalCodes.length,
    markTypeCounts,
    failedSerials: marks.flatMap((mark) =>
      mark.error === null
        ? []
        : [{ serialNumber: mark.serialNumber, markName: mark.markName, error: mark.error }]
    ),
  };
}

/**
 * One opposition from a company's point of view: which side it is on and
 * what the plaintiff pleaded. A company matching neither party is reported
 * as defendant with no alternate name.
 */
export function analyzeOpposition(
  record: OppositionRecord,
  companyName: string,
  gvkey: string | null = null
): OppositionAnalysis {
  const company = companyName.toLowerCase();
  const { plaintiffName, defendantName } = record.parties;

  let plaintiff: 0 | 1 = 0;
  let altName: string | null = null;
  if (plaintiffName && plaintiffName.toLowerCase().includes(company)) {
    plaintiff = 1;
    altName = plaintiffName;
  } else if (defendantName && defendantName.toLowerCase().includes(company)) {
    altName = defendantName;
  }

  const pleaded = record.marks.filter((mark) => mark.ownerSide === "plaintiff");
  const countOf = (markType: MarkType): number =>
    pleaded.filter((mark) => mark.markType === markType).length;

  return {
    oppositionNumber: record.oppositionNumber,
    companyName,
    gvkey,
    altName,
    plaintiff,
    marks: pleaded.length,
    usClassCount: new Set(
      pleaded.flatMap((mark) => mark.classes.usClasses.map((c) => c.code))
    ).size,
    internationalClassCount: new Set(
      pleaded.flatMap((mark) => mark.classes.internationalClasses.map((c) => c.code))
    ).size,
    startDate: record.timeline.filingDate,
    endDate: record.timeline.terminationDate,
    outcome: record.timeline.outcome,
    tmTypeCounts: {
      standard: countOf(MarkType.StandardText),
      stylized: countOf(MarkType.StylizedOrDesign),
      slogan: countOf(MarkType.Slogan),
    },
    markDetails: pleaded.map((mark) => ({
      serialNumber: mark.serialNumber,
      markName: mark.markName,
      markType: mark.markType,
    })),
  };
}

export class OppositionScraper {
  private proceedings: ProceedingSource;
  private classes: ClassSource;
  private markTypes: MarkTypeSource;
  private sleep: (ms: number) => Promise<void>;
  private interRequestDelayMs: number;
  private oppositionDelayMs: number;

  constructor(options: OppositionScraperOptions = {}) {
    const caseStatus = new CaseStatusClient();

    this.proceedings = options.proceedings ?? new TtabvueClient();
    this.classes = options.classes ?? caseStatus;
    this.markTypes = options.markTypes ?? new MarkTypeService(caseStatus);
    this.sleep = options.sleep ?? defaultSleep;
    this.interRequestDelayMs =
      options.interRequestDelayMs ?? config.get("interRequestDelayMs");
    this.oppositionDelayMs = options.oppositionDelayMs ?? config.get("oppositionDelayMs");
  }

  /**
   * Fetches the proceeding page once, then looks up classes and mark type for
   * each pleaded mark in page order. Lookup failures are kept on the mark.
   */
  public async scrapeOpposition(
    oppositionNumber: string,
    proceedingType: string = TTABVUE_LAYOUT.oppositionType,
    onProgress?: ProgressCallback
  ): Promise<OppositionRecord> {
    const startTime = Date.now();
    onProgress?.(0, `Fetching proceeding ${oppositionNumber}...`);

    let html: string;
    try {
      html = await this.proceedings.fetchProceeding(oppositionNumber, proceedingType);
    } catch (error) {
      throw new AppError(
        `Failed to fetch proceeding ${oppositionNumber}: ${describeHttpError(error)}`,
        502,
        "PROCEEDING_FETCH_FAILED"
      );
    }

    const facts = extractOppositionFacts(parseProceedingDocument(html));
    const marks: PleadedMark[] = [];
    const total = facts.marks.length;

    for (const [index, reference] of facts.marks.entries()) {
      onProgress?.(
        index / total,
        `Processing ${index + 1}/${total}: ${reference.serialNumber}`
      );

      const retrieval = await this.classes.fetchClasses(reference.serialNumber);
      await this.sleep(this.interRequestDelayMs);
      const markType = await this.markTypes.classifyMark(reference.serialNumber);
      await this.sleep(this.interRequestDelayMs);

      marks.push({
        ...reference,
        classes: retrieval.ok ? retrieval.classes : emptyClassSet(),
        markType,
        error: retrieval.ok ? null : retrieval.error,
      });
    }

    const record = buildOppositionRecord(oppositionNumber, proceedingType, facts, marks);
    logger.oppositionScraped(
      oppositionNumber,
      record.marks.length,
      record.failedSerials.length,
      Date.now() - startTime
    );
    onProgress?.(1, "Complete");
    return record;
  }

  public async searchProceedingsFromUrl(
    url: string,
    range: DateRange = {}
  ): Promise<ProceedingListing[]> {
    let html: string;
    try {
      html = await this.proceedings.fetchPage(url);
    } catch (error) {
      throw new AppError(
        `Failed to fetch proceedings page: ${describeHttpError(error)}`,
        502,
        "PROCEEDING_SEARCH_FAILED"
      );
    }
    return parseProceedingLinks(parseProceedingDocument(html), range);
  }

  public async searchOppositionsByParty(
    partyName: string,
    range: DateRange = {}
  ): Promise<ProceedingListing[]> {
    let html: string;
    try {
      html = await this.proceedings.fetchPartySearch(partyName);
    } catch (error) {
      throw new AppError(
        `Failed to search proceedings for ${partyName}: ${describeHttpError(error)}`,
        502,
        "PROCEEDING_SEARCH_FAILED"
      );
    }
    return parsePartySearchResults(parseProceedingDocument(html), range);
  }

  public async scrapeOppositionsFromUrl(
    url: string,
    range: DateRange = {},
    onProgress?: ProgressCallback
  ): Promise<BatchScrapeResult> {
    onProgress?.(0, "Extracting oppositions from URL...");
    const listings = await this.searchProceedingsFromUrl(url, range);
    return this.scrapeListings(url, listings, onProgress);
  }

  public async scrapePartyOppositions(
    partyName: string,
    range: DateRange = {},
    onProgress?: ProgressCallback
  ): Promise<BatchScrapeResult> {
    onProgress?.(0, `Searching oppositions for ${partyName}...`);
    const listings = await this.searchOppositionsByParty(partyName, range);
    return this.scrapeListings(partyName, listings, onProgress);
  }

  public async batchAnalyzeOppositions(
    url: string,
    companyName: string,
    gvkey: string | null = null,
    range: DateRange = {},
    onProgress?: ProgressCallback
  ): Promise<BatchAnalysisResult> {
    onProgress?.(0, "Extracting oppositions from URL...");
    const listings = await this.searchProceedingsFromUrl(url, range);

    const { results, failures } = await this.forEachListing(
      listings,
      "Analyzing",
      async (listing) =>
        analyzeOpposition(
          await this.scrapeOpposition(listing.proceedingNumber, listing.proceedingType),
          companyName,
          gvkey
        ),
      onProgress
    );

    return { companyName, gvkey, listings, analyses: results, failures };
  }

  public async close(): Promise<void> {
    await this.markTypes.close?.();
  }

  private async scrapeListings(
    source: string,
    listings: ProceedingListing[],
    onProgress?: ProgressCallback
  ): Promise<BatchScrapeResult> {
    const { results: records, failures } = await this.forEachListing(
      listings,
      "Processing",
      (listing) => this.scrapeOpposition(listing.proceedingNumber, listing.proceedingType),
      onProgress
    );

    return {
      source,
      listings,
      records,
      failures,
      totalSerialCount: records.reduce((sum, record) => sum + record.marks.length, 0),
      uniqueUsClasses: uniqueSorted(records.flatMap((record) => record.uniqueUsClasses)),
      uniqueInternationalClasses: uniqueSorted(
        records.flatMap((record) => record.uniqueInternationalClasses)
      ),
      totalUsClasses: records.reduce((sum, record) => sum + record.totalUsClasses, 0),
      totalInternationalClasses: records.reduce(
        (sum, record) => sum + record.totalInternationalClasses,
        0
      ),
    };
  }

  /** Oppositions strictly one after another; a failed one is recorded and skipped. */
  private async forEachListing<T>(
    listings: ProceedingListing[],
    verb: string,
    work: (listing: ProceedingListing) => Promise<T>,
    onProgress?: ProgressCallback
  ): Promise<{ results: T[]; failures: ProceedingFailure[] }> {
    const results: T[] = [];
    const failures: ProceedingFailure[] = [];
    const total = listings.length;

    for (const [index, listing] of listings.entries()) {
      if (index > 0) await this.sleep(this.oppositionDelayMs);
      onProgress?.(
        (index + 1) / total,
        `${verb} opposition ${index + 1}/${total}: ${listing.proceedingNumber}`
      );

      try {
        results.push(await work(listing));
      } catch (error) {
        logger.warn("Opposition failed", {
          action: "opposition_failed",
          oppositionNumber: listing.proceedingNumber,
          reason: errorMessage(error),
        });
        failures.push({ proceedingNumber: listing.proceedingNumber, error: errorMessage(error) });
      }
    }

    return { results, failures };
  }
}
