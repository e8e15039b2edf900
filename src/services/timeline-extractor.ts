import { DocumentTable, ProceedingDocument } from "../types/document-interface";
import { Outcome, OppositionTimeline } from "../types/opposition-interface";
import { findDate } from "../utils/date-utils";
import { TTABVUE_LAYOUT } from "./ttabvue-layout";

const PENDING_TIMELINE: OppositionTimeline = {
  filingDate: null,
  terminationDate: null,
  outcome: "pending",
};

function findHistoryTable(document: ProceedingDocument): DocumentTable | undefined {
  return document.tables.find((table) =>
    table.rows.some((row) =>
      row.text.toLowerCase().includes(TTABVUE_LAYOUT.sectionTerminator)
    )
  );
}

/** Date in the cell after the first "Filing Date" label, scanning every row. */
function findSummaryFilingDate(document: ProceedingDocument): string | null {
  for (const table of document.tables) {
    for (const row of table.rows) {
      for (let i = 0; i < row.cells.length - 1; i++) {
        if (!row.cells[i].text.toLowerCase().includes(TTABVUE_LAYOUT.filingDateLabel)) {
          continue;
        }
        const date = findDate(row.cells[i + 1].text);
        if (date) return date;
      }
    }
  }
  return null;
}

function findFiledAndFeeDate(history: DocumentTable): string | null {
  const entry = history.rows.find((row) =>
    row.text.includes(TTABVUE_LAYOUT.filedAndFeeEntry)
  );
  return entry ? findDate(entry.text) : null;
}

/**
 * Filing date, last action date and outcome. History rows are chronological,
 * so the last dated row is the termination date once the case has ended and
 * the latest action otherwise. The outcome follows the last row, in row
 * order, that mentions SUSTAINED or DISMISSED; a row naming both counts as
 * sustained.
 */
export function extractTimeline(document: ProceedingDocument): OppositionTimeline {
  const history = findHistoryTable(document);
  if (!history) return { ...PENDING_TIMELINE };

  let terminationDate: string | null = null;
  let outcome: Outcome = "pending";

  for (const row of history.rows) {
    const date = findDate(row.text);
    if (date) terminationDate = date;

    const upper = row.text.toUpperCase();
    if (upper.includes(TTABVUE_LAYOUT.sustainedKeyword)) {
      outcome = "sustained";
    } else if (upper.includes(TTABVUE_LAYOUT.dismissedKeyword)) {
      outcome = "dismissed";
    }
  }

  return {
    filingDate: findSummaryFilingDate(document) ?? findFiledAndFeeDate(history),
    terminationDate,
    outcome,
  };
}
