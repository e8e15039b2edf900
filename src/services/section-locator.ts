import {
  ClassifiedDocument,
  ClassifiedRow,
  Section,
} from "../types/document-interface";
import { TTABVUE_LAYOUT } from "./ttabvue-layout";

export type HeadingPredicate = (heading: string) => boolean;

export function headingContains(text: string): HeadingPredicate {
  const needle = text.toLowerCase();
  return (heading) => heading.toLowerCase().includes(needle);
}

function endsSection(row: ClassifiedRow): boolean {
  return (
    row.tag.kind === "section_break" ||
    row.text.toLowerCase().includes(TTABVUE_LAYOUT.sectionTerminator)
  );
}

/**
 * Finds the first heading row, in document order, that satisfies the
 * predicate, and bounds its section at the next major-section row, the next
 * row mentioning the prosecution history, or the end of the table. Later
 * matches in the same or other tables are ignored.
 */
export function locateSection(
  document: ClassifiedDocument,
  name: string,
  matches: HeadingPredicate
): Section | null {
  for (let tableIndex = 0; tableIndex < document.tables.length; tableIndex++) {
    const rows = document.tables[tableIndex].rows;

    const startRowIndex = rows.findIndex(
      (row) => row.tag.kind === "heading" && matches(row.tag.label)
    );
    if (startRowIndex === -1) continue;

    let endRowIndex = rows.length;
    for (let i = startRowIndex + 1; i < rows.length; i++) {
      if (endsSection(rows[i])) {
        endRowIndex = i;
        break;
      }
    }

    return { name, tableIndex, startRowIndex, endRowIndex };
  }

  return null;
}

export function locatePleadedSection(document: ClassifiedDocument): Section | null {
  return locateSection(
    document,
    "Pleaded applications and registrations",
    headingContains(TTABVUE_LAYOUT.pleadedHeading)
  );
}

/** Rows strictly between the heading and the section end. */
export function sectionRows(
  document: ClassifiedDocument,
  section: Section
): readonly ClassifiedRow[] {
  return document.tables[section.tableIndex].rows.slice(
    section.startRowIndex + 1,
    section.endRowIndex
  );
}
