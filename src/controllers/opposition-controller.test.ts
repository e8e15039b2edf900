import express from "express";
import { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { OppositionController } from "./opposition-controller";
import { createRouter } from "../routes";
import { BatchJobStore, StartedJob } from "../services/batch-job-store";
import { ExportService } from "../services/export-service";
import { OppositionScraper } from "../services/opposition-scraper";
import { MarkType } from "../types/opposition-interface";
import { loadFixture } from "../__fixtures__/html";

const OPPOSITION_PAGE = loadFixture("opposition-91234567.html");
const RESULTS_PAGE = `<table><tr><td>09/01/2021 <a href="?pno=91234567&amp;pty=OPP">91234567</a></td></tr></table>`;

class RecordingJobStore extends BatchJobStore {
  public started: StartedJob[] = [];

  public override start(...args: Parameters<BatchJobStore["start"]>): StartedJob {
    const started = super.start(...args);
    this.started.push(started);
    return started;
  }
}

const jobs = new RecordingJobStore();
const scraper = new OppositionScraper({
  proceedings: {
    fetchProceeding: async () => OPPOSITION_PAGE,
    fetchPartySearch: async () => RESULTS_PAGE,
    fetchPage: async () => RESULTS_PAGE,
  },
  classes: {
    fetchClasses: async () => ({
      ok: true,
      classes: {
        usClasses: [{ code: "021", description: "Housewares" }],
        internationalClasses: [{ code: "021", description: "Household utensils" }],
        description: "Kitchen utensils",
        filingDate: "2019-04-02",
      },
    }),
  },
  markTypes: { classifyMark: async () => MarkType.StandardText },
  sleep: async () => undefined,
  interRequestDelayMs: 0,
  oppositionDelayMs: 0,
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = express();
  app.use(express.json());
  app.use("/api", createRouter(new OppositionController(scraper, ExportService.getInstance(), jobs)));

  server = app.listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("no port");
  baseUrl = `http://127.0.0.1:${address.port}/api`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve()))
  );
});

const post = (path: string, body: unknown) =>
  fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });

describe("opposition routes", () => {
  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ success: true, data: { status: "healthy" } });
  });

  it("returns the scraped record", async () => {
    const response = await fetch(`${baseUrl}/oppositions/91234567`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      message: "Found 2 pleaded marks",
      data: {
        oppositionNumber: "91234567",
        plaintiffSerials: ["87654321"],
        uniqueUsClasses: ["021"],
        totalUsClasses: 2,
      },
    });
  });

  it("rejects a malformed proceeding number", async () => {
    const response = await fetch(`${baseUrl}/oppositions/1234`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      message: "Proceeding number must be 8 digits",
      error: "VALIDATION_ERROR",
    });
  });

  it("analyses the opposition for a company", async () => {
    const response = await fetch(`${baseUrl}/oppositions/91234567/analysis?company=acme`);

    expect(await response.json()).toMatchObject({
      data: { plaintiff: 1, altName: "Acme Widgets Inc", marks: 1 },
    });
  });

  it("exports the summary row as text", async () => {
    const response = await fetch(`${baseUrl}/oppositions/91234567/export?format=row`);

    expect(response.headers.get("content-type")).toMatch(/^text\/plain/);
    expect(await response.text()).toBe(
      ["2", "2", "2", "03/01/2020", "05/10/2021", "1", "1", "87654321", "1", "76543210"].join(
        "\t"
      )
    );
  });

  it("exports a workbook attachment", async () => {
    const response = await fetch(`${baseUrl}/oppositions/91234567/export`);
    const workbook = XLSX.read(Buffer.from(await response.arrayBuffer()), { type: "buffer" });

    expect(response.headers.get("content-disposition")).toBe(
      'attachment; filename="opposition_91234567_classes.xlsx"'
    );
    expect(workbook.SheetNames).toEqual(["Trademark Classes", "Summary"]);
  });
});

describe("batch routes", () => {
  it("runs a party batch and serves its workbook", async () => {
    const response = await post("/batches/party", { partyName: "Acme Widgets" });

    expect(jobs.started).toHaveLength(1);
    const { job, completion } = jobs.started[0];
    expect(response.status).toBe(202);
    expect(await response.json()).toMatchObject({ data: { jobId: job.id, status: "pending" } });

    await completion;

    const status = await fetch(`${baseUrl}/batches/${job.id}`);
    expect(await status.json()).toMatchObject({
      data: {
        kind: "party",
        status: "completed",
        progress: 1,
        result: { source: "Acme Widgets", records: [{ oppositionNumber: "91234567" }] },
      },
    });

    const download = await fetch(`${baseUrl}/batches/${job.id}/download`);
    expect(download.status).toBe(200);
    expect(download.headers.get("content-disposition")).toMatch(
      /^attachment; filename="oppositions_.+\.xlsx"$/
    );
  });

  it("validates batch requests", async () => {
    const response = await post("/batches/url", { url: "ftp://example.test/list" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: "VALIDATION_ERROR" });
  });

  it("rejects dates outside MM/DD/YYYY", async () => {
    const response = await post("/batches/party", { partyName: "Acme", startDate: "2021-01-01" });

    expect(await response.json()).toMatchObject({ message: "Dates must be MM/DD/YYYY" });
  });

  it("rejects dates that are not on the calendar", async () => {
    const response = await post("/batches/party", { partyName: "Acme", endDate: "13/45/2021" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      message: '"endDate" is not a calendar date',
    });
  });

  it("rejects a start date after the end date", async () => {
    const response = await post("/batches/party", {
      partyName: "Acme",
      startDate: "06/01/2021",
      endDate: "01/01/2021",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      message: "startDate must not be after endDate",
    });
  });

  it("only fetches listing pages from the TTABVue host", async () => {
    const startedBefore = jobs.started.length;

    const outside = await post("/batches/url", {
      url: "http://169.254.169.254/latest/meta-data/",
    });
    const analysis = await post("/batches/analysis", {
      url: "https://internal.example.test/ttabvue/v?pno=91234567",
      companyName: "Acme",
    });

    expect(outside.status).toBe(400);
    expect(await outside.json()).toMatchObject({
      error: "VALIDATION_ERROR",
      message: "URL must point at ttabvue.uspto.gov",
    });
    expect(analysis.status).toBe(400);
    expect(jobs.started).toHaveLength(startedBefore);
  });

  it("accepts a TTABVue results page", async () => {
    const response = await post("/batches/url", {
      url: "https://ttabvue.uspto.gov/ttabvue/v?qt=adv&pn=Acme",
      startDate: "01/01/2021",
      endDate: "12/31/2021",
    });

    expect(response.status).toBe(202);
    const { job, completion } = jobs.started[jobs.started.length - 1];
    await completion;
    expect(job).toMatchObject({
      kind: "url",
      status: "completed",
      outcome: { kind: "scrape", result: { records: [{ oppositionNumber: "91234567" }] } },
    });
  });

  it("reports unknown jobs", async () => {
    const response = await fetch(`${baseUrl}/batches/missing-job`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: "JOB_NOT_FOUND" });
  });
});
