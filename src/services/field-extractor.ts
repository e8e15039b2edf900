import {
  ClassifiedRow,
  DocumentCell,
  DocumentRow,
} from "../types/document-interface";
import {
  MARK_NAME_LOOKAHEAD,
  TTABVUE_LAYOUT,
  UNKNOWN_MARK_NAME,
} from "./ttabvue-layout";

const SERIAL_NUMBER = /\d{8}/;

const hasClass = (cell: DocumentCell, className: string): boolean =>
  cell.classes.includes(className);

const headerCells = (row: DocumentRow): DocumentCell[] =>
  row.cells.filter((cell) => cell.tag === "th");

const firstDataCell = (row: DocumentRow): DocumentCell | undefined =>
  row.cells.find((cell) => cell.tag === "td");

function rowHasLabel(row: DocumentRow, label: string): boolean {
  return headerCells(row).some((cell) => cell.text.includes(label));
}

/**
 * Value of a "label: value" row, read from the first data cell. Null when no
 * header cell carries the label or the row has no data cell.
 */
export function readLabeledValue(row: DocumentRow, label: string): string | null {
  if (!rowHasLabel(row, label)) return null;
  return firstDataCell(row)?.text ?? null;
}

/**
 * Serial number of a "Serial #:" row: the first 8-digit run in the text of a
 * link to the case-status site that carries a case number.
 */
export function extractSerial(row: DocumentRow): string | null {
  if (!rowHasLabel(row, TTABVUE_LAYOUT.serialLabel)) return null;

  const link = row.cells
    .flatMap((cell) => cell.links)
    .find(
      (candidate) =>
        candidate.href.includes(TTABVUE_LAYOUT.caseStatusHost) &&
        candidate.href.includes(TTABVUE_LAYOUT.caseNumberParam)
    );
  if (!link) return null;

  return link.text.match(SERIAL_NUMBER)?.[0] ?? null;
}

export function extractOwner(row: DocumentRow): string | null {
  return readLabeledValue(row, TTABVUE_LAYOUT.ownerLabel);
}

export function extractMarkText(row: DocumentRow): string | null {
  return readLabeledValue(row, TTABVUE_LAYOUT.markLabel);
}

export function extractPartyName(row: DocumentRow): string | null {
  const labelled = row.cells.some(
    (cell) =>
      cell.tag === "th" &&
      hasClass(cell, TTABVUE_LAYOUT.headingCellClass) &&
      cell.text.includes(TTABVUE_LAYOUT.partyNameLabel)
  );
  if (!labelled) return null;

  const link = row.cells
    .flatMap((cell) => cell.links)
    .find((candidate) => candidate.href.includes(TTABVUE_LAYOUT.partyNameMarker));
  return link ? link.text : null;
}

/** Text of the row's first major-section cell when that text is non-empty. */
export function extractSectionLabel(row: DocumentRow): string | null {
  const cell = row.cells.find(
    (candidate) =>
      candidate.tag === "td" &&
      hasClass(candidate, TTABVUE_LAYOUT.sectionCellClass)
  );
  return cell && cell.text ? cell.text : null;
}

export function extractHeadingLabel(row: DocumentRow): string | null {
  const cell = row.cells.find(
    (candidate) =>
      candidate.tag === "th" &&
      hasClass(candidate, TTABVUE_LAYOUT.headingCellClass)
  );
  return cell ? cell.text : null;
}

/**
 * Looks at most `lookahead` rows past the serial row, never past `endIndex`,
 * for the first "Mark:" row.
 */
export function extractMarkName(
  rows: readonly ClassifiedRow[],
  serialIndex: number,
  endIndex: number = rows.length,
  lookahead: number = MARK_NAME_LOOKAHEAD
): string {
  const stop = Math.min(serialIndex + 1 + lookahead, endIndex, rows.length);

  for (let i = serialIndex + 1; i < stop; i++) {
    const tag = rows[i].tag;
    if (tag.kind === "mark") {
      return tag.markName || UNKNOWN_MARK_NAME;
    }
  }

  return UNKNOWN_MARK_NAME;
}
