import { describe, expect, it, vi } from "vitest";
import { ClassRetrievalResult, MarkType, ProgressCallback } from "../types/opposition-interface";
import {
  ClassSource,
  MarkTypeSource,
  OppositionScraper,
  analyzeOpposition,
} from "./opposition-scraper";
import { ProceedingSource } from "./ttabvue-client";
import { loadFixture } from "../__fixtures__/html";

const OPPOSITION_PAGE = loadFixture("opposition-91234567.html");

const RESULTS_PAGE = `
  <table>
    <tr><td>09/01/2021 <a href="?pno=91234567&amp;pty=OPP">91234567</a></td></tr>
    <tr><td>10/01/2021 <a href="?pno=91000002&amp;pty=OPP">91000002</a></td></tr>
  </table>`;

const classesBySerial: Record<string, ClassRetrievalResult> = {
  "87654321": {
    ok: true,
    classes: {
      usClasses: [
        { code: "023", description: "Cutlery" },
        { code: "021", description: "Housewares" },
      ],
      internationalClasses: [{ code: "021", description: "Household utensils" }],
      description: "Kitchen utensils",
      filingDate: "2019-04-02",
    },
  },
};

const markTypesBySerial: Record<string, MarkType> = {
  "87654321": MarkType.StandardText,
  "76543210": MarkType.Slogan,
};

function setup() {
  const proceedings: ProceedingSource = {
    fetchProceeding: vi.fn(async (proceedingNumber: string) => {
      if (proceedingNumber === "91000002") throw new Error("boom");
      return OPPOSITION_PAGE;
    }),
    fetchPartySearch: vi.fn(async () => RESULTS_PAGE),
    fetchPage: vi.fn(async () => RESULTS_PAGE),
  };
  const classes: ClassSource = {
    fetchClasses: vi.fn(
      async (serial: string): Promise<ClassRetrievalResult> =>
        classesBySerial[serial] ?? { ok: false, error: "http_404" }
    ),
  };
  const markTypes: MarkTypeSource = {
    classifyMark: vi.fn(async (serial: string) => markTypesBySerial[serial] ?? MarkType.NoImage),
    close: vi.fn(async () => undefined),
  };
  const sleep = vi.fn(async (_ms: number) => undefined);
  const scraper = new OppositionScraper({
    proceedings,
    classes,
    markTypes,
    sleep,
    interRequestDelayMs: 5,
    oppositionDelayMs: 9,
  });

  return { scraper, proceedings, classes, markTypes, sleep };
}

describe("OppositionScraper.scrapeOpposition", () => {
  it("combines page facts with class and mark type lookups", async () => {
    const { scraper, proceedings } = setup();

    const record = await scraper.scrapeOpposition("91234567");

    expect(proceedings.fetchProceeding).toHaveBeenCalledWith("91234567", "OPP");
    expect(record).toMatchObject({
      oppositionNumber: "91234567",
      proceedingType: "OPP",
      parties: { plaintiffName: "Acme Widgets Inc", defendantName: "Beta Gadgets LLC" },
      plaintiffSerials: ["87654321"],
      defendantSerials: ["76543210"],
      uniqueUsClasses: ["021", "023"],
      uniqueInternationalClasses: ["021"],
      totalUsClasses: 2,
      totalInternationalClasses: 1,
      markTypeCounts: { 0: 0, 1: 1, 2: 0, 3: 1 },
      timeline: { filingDate: "03/01/2020", terminationDate: "05/10/2021", outcome: "sustained" },
    });
  });

  it("keeps a failed class lookup on the mark and carries on", async () => {
    const { scraper } = setup();

    const record = await scraper.scrapeOpposition("91234567");

    expect(record.marks[1]).toEqual({
      serialNumber: "76543210",
      markName: "BETA BUY MORE",
      ownerSide: "defendant",
      classes: { usClasses: [], internationalClasses: [], description: "", filingDate: "" },
      markType: MarkType.Slogan,
      error: "http_404",
    });
    expect(record.failedSerials).toEqual([
      { serialNumber: "76543210", markName: "BETA BUY MORE", error: "http_404" },
    ]);
  });

  it("pauses between requests and reports progress", async () => {
    const { scraper, sleep } = setup();
    const progress: [number, string][] = [];
    const onProgress: ProgressCallback = (value, message) => progress.push([value, message]);

    await scraper.scrapeOpposition("91234567", "OPP", onProgress);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5, 5, 5, 5]);
    expect(progress).toEqual([
      [0, "Fetching proceeding 91234567..."],
      [0, "Processing 1/2: 87654321"],
      [0.5, "Processing 2/2: 76543210"],
      [1, "Complete"],
    ]);
  });

  it("gives the same record for the same inputs", async () => {
    const { scraper } = setup();

    const first = await scraper.scrapeOpposition("91234567");
    const second = await scraper.scrapeOpposition("91234567");

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("fails when the proceeding page cannot be fetched", async () => {
    const { scraper } = setup();

    await expect(scraper.scrapeOpposition("91000002")).rejects.toMatchObject({
      statusCode: 502,
      code: "PROCEEDING_FETCH_FAILED",
      message: "Failed to fetch proceeding 91000002: Error",
    });
  });
});

describe("OppositionScraper batches", () => {
  it("records a failed opposition and finishes the rest", async () => {
    const { scraper, sleep } = setup();
    const progress: string[] = [];

    const result = await scraper.scrapeOppositionsFromUrl(
      "https://ttabvue.uspto.gov/ttabvue/v?qt=adv",
      {},
      (_value, message) => progress.push(message)
    );

    expect(result.records.map((record) => record.oppositionNumber)).toEqual(["91234567"]);
    expect(result.failures).toEqual([
      { proceedingNumber: "91000002", error: "Failed to fetch proceeding 91000002: Error" },
    ]);
    expect(result).toMatchObject({
      source: "https://ttabvue.uspto.gov/ttabvue/v?qt=adv",
      totalSerialCount: 2,
      uniqueUsClasses: ["021", "023"],
      totalUsClasses: 2,
    });
    expect(progress).toEqual([
      "Extracting oppositions from URL...",
      "Processing opposition 1/2: 91234567",
      "Processing opposition 2/2: 91000002",
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5, 5, 5, 5, 9]);
  });

  it("applies the filing date range to the listings", async () => {
    const { scraper, proceedings } = setup();

    const result = await scraper.scrapePartyOppositions("Acme", { endDate: "09/30/2021" });

    expect(proceedings.fetchPartySearch).toHaveBeenCalledWith("Acme");
    expect(result.listings).toEqual([
      { proceedingNumber: "91234567", proceedingType: "OPP", filingDate: "09/01/2021" },
    ]);
    expect(result.failures).toEqual([]);
  });

  it("analyzes each opposition for the company", async () => {
    const { scraper } = setup();

    const result = await scraper.batchAnalyzeOppositions(
      "https://ttabvue.uspto.gov/ttabvue/v?qt=adv",
      "acme widgets",
      "001234"
    );

    expect(result.analyses).toHaveLength(1);
    expect(result.analyses[0]).toMatchObject({ plaintiff: 1, altName: "Acme Widgets Inc" });
    expect(result.failures).toHaveLength(1);
    expect(result.gvkey).toBe("001234");
  });

  it("fails when the results page cannot be fetched", async () => {
    const { scraper, proceedings } = setup();
    vi.mocked(proceedings.fetchPage).mockRejectedValueOnce(new Error("down"));

    await expect(scraper.searchProceedingsFromUrl("https://example.test")).rejects.toMatchObject({
      code: "PROCEEDING_SEARCH_FAILED",
    });
  });

  it("closes the mark type source", async () => {
    const { scraper, markTypes } = setup();

    await scraper.close();
    expect(markTypes.close).toHaveBeenCalledTimes(1);
  });
});

describe("analyzeOpposition", () => {
  it("reports the plaintiff's pleaded marks", async () => {
    const record = await setup().scraper.scrapeOpposition("91234567");

    expect(analyzeOpposition(record, "ACME WIDGETS", "001234")).toEqual({
      oppositionNumber: "91234567",
      companyName: "ACME WIDGETS",
      gvkey: "001234",
      altName: "Acme Widgets Inc",
      plaintiff: 1,
      marks: 1,
      usClassCount: 2,
      internationalClassCount: 1,
      startDate: "03/01/2020",
      endDate: "05/10/2021",
      outcome: "sustained",
      tmTypeCounts: { standard: 1, stylized: 0, slogan: 0 },
      markDetails: [
        { serialNumber: "87654321", markName: "ACME", markType: MarkType.StandardText },
      ],
    });
  });

  it("matches the defendant or neither party", async () => {
    const record = await setup().scraper.scrapeOpposition("91234567");

    expect(analyzeOpposition(record, "beta")).toMatchObject({
      plaintiff: 0,
      altName: "Beta Gadgets LLC",
      gvkey: null,
    });
    expect(analyzeOpposition(record, "Gamma")).toMatchObject({ plaintiff: 0, altName: null });
  });
});
