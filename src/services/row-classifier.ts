import {
  ClassifiedDocument,
  ClassifiedRow,
  DocumentRow,
  ProceedingDocument,
  RowTag,
} from "../types/document-interface";
import {
  extractHeadingLabel,
  extractMarkText,
  extractOwner,
  extractPartyName,
  extractSectionLabel,
  extractSerial,
} from "./field-extractor";

/**
 * Tags a row once so that section location, party resolution and mark
 * extraction switch on the tag instead of re-reading cells. The first
 * matching shape wins.
 */
export function classifyRow(row: DocumentRow): RowTag {
  const sectionLabel = extractSectionLabel(row);
  if (sectionLabel !== null) {
    return { kind: "section_break", label: sectionLabel };
  }

  const serialNumber = extractSerial(row);
  if (serialNumber !== null) {
    return { kind: "serial", serialNumber };
  }

  const markName = extractMarkText(row);
  if (markName !== null) {
    return { kind: "mark", markName };
  }

  const owner = extractOwner(row);
  if (owner !== null) {
    return { kind: "owner", owner };
  }

  const partyName = extractPartyName(row);
  if (partyName !== null) {
    return { kind: "party_name", name: partyName };
  }

  const heading = extractHeadingLabel(row);
  if (heading !== null) {
    return { kind: "heading", label: heading };
  }

  return { kind: "other" };
}

export function classifyDocument(document: ProceedingDocument): ClassifiedDocument {
  return {
    tables: document.tables.map((table) => ({
      rows: table.rows.map(
        (row): ClassifiedRow => ({ text: row.text, tag: classifyRow(row) })
      ),
    })),
  };
}
