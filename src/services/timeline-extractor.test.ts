import { describe, expect, it } from "vitest";
import { parseProceedingDocument } from "./document-parser";
import { extractTimeline } from "./timeline-extractor";

const historyTable = (...entries: [string, string][]): string =>
  `<table><tr><td class="t2b">Prosecution History</td></tr>${entries
    .map(([date, text]) => `<tr><td>${date}</td><td>${text}</td></tr>`)
    .join("")}</table>`;

const timelineOf = (html: string) => extractTimeline(parseProceedingDocument(html));

describe("extractTimeline", () => {
  it("takes the last dated history row and the outcome keyword", () => {
    const html = historyTable(["03/01/2020", "FILED AND FEE"], ["05/10/2021", "DISMISSED"]);

    expect(timelineOf(html)).toEqual({
      filingDate: "03/01/2020",
      terminationDate: "05/10/2021",
      outcome: "dismissed",
    });
  });

  it("prefers the labelled filing date over the history entry", () => {
    const html =
      `<table><tr><th>Filing Date:</th><td>02/28/2020</td></tr></table>` +
      historyTable(["03/01/2020", "FILED AND FEE"], ["04/01/2020", "ANSWER"]);

    expect(timelineOf(html)).toEqual({
      filingDate: "02/28/2020",
      terminationDate: "04/01/2020",
      outcome: "pending",
    });
  });

  it("lets the last keyword row decide the outcome", () => {
    const html = historyTable(
      ["01/02/2021", "OPPOSITION SUSTAINED IN PART"],
      ["03/04/2021", "DISMISSED WITH PREJUDICE"]
    );

    expect(timelineOf(html).outcome).toBe("dismissed");
  });

  it("counts a row naming both keywords as sustained", () => {
    const html = historyTable(["01/02/2021", "MOTION TO DISMISS DENIED; DISMISSED CLAIM SUSTAINED"]);

    expect(timelineOf(html).outcome).toBe("sustained");
  });

  it("is pending with no dates when there is no history table", () => {
    const html = `<table><tr><th>Filing Date:</th><td>02/28/2020</td></tr></table>`;

    expect(timelineOf(html)).toEqual({
      filingDate: null,
      terminationDate: null,
      outcome: "pending",
    });
  });
});
