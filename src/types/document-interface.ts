/**
 * Read-only table/row/cell tree of one fetched proceeding page.
 * Built once by the document parser; nothing downstream mutates it.
 */
export interface ProceedingDocument {
  readonly tables: readonly DocumentTable[];
  readonly anchors: readonly DocumentAnchor[];
}

export interface DocumentTable {
  readonly rows: readonly DocumentRow[];
}

export interface DocumentRow {
  readonly cells: readonly DocumentCell[];
  /** Cell texts joined by a single space. */
  readonly text: string;
}

export interface DocumentCell {
  readonly tag: "th" | "td";
  readonly classes: readonly string[];
  readonly text: string;
  readonly links: readonly DocumentLink[];
}

export interface DocumentLink {
  readonly href: string;
  readonly text: string;
}

export interface DocumentAnchor extends DocumentLink {
  /** Text of the enclosing `td`, or null when the anchor sits outside one. */
  readonly cellText: string | null;
}

export type RowTag =
  | { kind: "section_break"; label: string }
  | { kind: "serial"; serialNumber: string }
  | { kind: "mark"; markName: string }
  | { kind: "owner"; owner: string }
  | { kind: "party_name"; name: string }
  | { kind: "heading"; label: string }
  | { kind: "other" };

export interface ClassifiedRow {
  readonly text: string;
  readonly tag: RowTag;
}

export interface ClassifiedTable {
  readonly rows: readonly ClassifiedRow[];
}

export interface ClassifiedDocument {
  readonly tables: readonly ClassifiedTable[];
}

export interface Section {
  name: string;
  tableIndex: number;
  /** Index of the heading row. */
  startRowIndex: number;
  /** Exclusive. */
  endRowIndex: number;
}
