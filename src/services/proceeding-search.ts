import { ProceedingDocument } from "../types/document-interface";
import { DateRange, ProceedingListing } from "../types/opposition-interface";
import {
  findDate,
  findLooseDate,
  hasDateRange,
  isWithinRange,
} from "../utils/date-utils";
import { TTABVUE_LAYOUT } from "./ttabvue-layout";

const PROCEEDING_NUMBER = /pno=(\d+)/;
const PROCEEDING_TYPE = /pty=([A-Z]+)/;

/**
 * Listings with a date are kept when they fall inside the range (or there is
 * no range); listings without one only when there is no range.
 */
function admits(filingDate: string | null, range?: DateRange): boolean {
  if (!hasDateRange(range)) return true;
  return filingDate !== null && range !== undefined && isWithinRange(filingDate, range);
}

function uniqueByNumber(listings: ProceedingListing[]): ProceedingListing[] {
  const seen = new Set<string>();
  return listings.filter((listing) => {
    if (seen.has(listing.proceedingNumber)) return false;
    seen.add(listing.proceedingNumber);
    return true;
  });
}

/**
 * Oppositions linked from a TTABVue results page. Each link's filing date is
 * read from the cell that holds it; other proceeding types are skipped.
 */
export function parseProceedingLinks(
  document: ProceedingDocument,
  range?: DateRange
): ProceedingListing[] {
  const listings: ProceedingListing[] = [];

  for (const anchor of document.anchors) {
    if (!anchor.href.includes(TTABVUE_LAYOUT.proceedingNumberParam)) continue;

    const proceedingNumber = anchor.href.match(PROCEEDING_NUMBER)?.[1];
    if (!proceedingNumber) continue;

    const proceedingType = anchor.href.match(PROCEEDING_TYPE)?.[1] ?? null;
    if (proceedingType !== TTABVUE_LAYOUT.oppositionType) continue;

    const filingDate = anchor.cellText ? findLooseDate(anchor.cellText) : null;
    if (!admits(filingDate, range)) continue;

    listings.push({ proceedingNumber, proceedingType, filingDate });
  }

  return uniqueByNumber(listings);
}

/**
 * Proceedings on a party-name search page. The filing date is the rightmost
 * cell of the row that contains a date.
 */
export function parsePartySearchResults(
  document: ProceedingDocument,
  range?: DateRange
): ProceedingListing[] {
  const listings: ProceedingListing[] = [];

  for (const table of document.tables) {
    for (const row of table.rows) {
      const link = row.cells
        .flatMap((cell) => cell.links)
        .find((candidate) =>
          candidate.href.includes(TTABVUE_LAYOUT.proceedingNumberParam)
        );
      if (!link) continue;

      const proceedingNumber = link.href.match(PROCEEDING_NUMBER)?.[1];
      if (!proceedingNumber) continue;

      let filingDate: string | null = null;
      for (let i = row.cells.length - 1; i >= 0 && filingDate === null; i--) {
        filingDate = findDate(row.cells[i].text);
      }
      if (!admits(filingDate, range)) continue;

      listings.push({
        proceedingNumber,
        proceedingType:
          link.href.match(PROCEEDING_TYPE)?.[1] ?? TTABVUE_LAYOUT.oppositionType,
        filingDate,
      });
    }
  }

  return uniqueByNumber(listings);
}
