import * as cheerio from "cheerio";
import {
  DocumentAnchor,
  DocumentCell,
  DocumentRow,
  ProceedingDocument,
} from "../types/document-interface";

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Parses a proceeding page into its table/row/cell tree. Tables and rows keep
 * document order; nested tables appear both on their own and inside the rows
 * of the table that holds them.
 */
export function parseProceedingDocument(html: string): ProceedingDocument {
  const $ = cheerio.load(html);

  const tables = $("table")
    .toArray()
    .map((table) => ({
      rows: $(table)
        .find("tr")
        .toArray()
        .map((tr): DocumentRow => {
          const cells = $(tr)
            .find("th, td")
            .toArray()
            .map(
              (cell): DocumentCell => ({
                tag: cell.tagName.toLowerCase() === "th" ? "th" : "td",
                classes: ($(cell).attr("class") ?? "")
                  .split(/\s+/)
                  .filter(Boolean),
                text: normalizeText($(cell).text()),
                links: $(cell)
                  .find("a[href]")
                  .toArray()
                  .map((a) => ({
                    href: $(a).attr("href") ?? "",
                    text: normalizeText($(a).text()),
                  })),
              })
            );

          const text =
            cells.length > 0
              ? normalizeText(cells.map((cell) => cell.text).join(" "))
              : normalizeText($(tr).text());

          return { cells, text };
        }),
    }));

  const anchors = $("a[href]")
    .toArray()
    .map((a): DocumentAnchor => {
      const cell = $(a).closest("td");
      return {
        href: $(a).attr("href") ?? "",
        text: normalizeText($(a).text()),
        cellText: cell.length > 0 ? normalizeText(cell.text()) : null,
      };
    });

  return { tables, anchors };
}
