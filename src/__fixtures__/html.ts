import fs from "fs";
import path from "path";
import { parseProceedingDocument } from "../services/document-parser";
import { classifyDocument } from "../services/row-classifier";
import {
  ClassifiedDocument,
  ClassifiedRow,
  DocumentRow,
} from "../types/document-interface";

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, name), "utf8");
}

/** Rows of a single table built from `<tr>` markup. */
export function tableRows(rowsHtml: string): readonly DocumentRow[] {
  return parseProceedingDocument(`<table>${rowsHtml}</table>`).tables[0].rows;
}

export function classifiedTables(...tablesHtml: string[]): ClassifiedDocument {
  const html = tablesHtml.map((rows) => `<table>${rows}</table>`).join("");
  return classifyDocument(parseProceedingDocument(html));
}

export function classifiedRows(rowsHtml: string): readonly ClassifiedRow[] {
  return classifiedTables(rowsHtml).tables[0].rows;
}

export const serialRow = (serial: string): string =>
  `<tr><th>Serial #:</th><td><a href="https://tsdr.uspto.gov/#caseNumber=${serial}&amp;caseType=SERIAL_NO">${serial}</a></td></tr>`;

export const markRow = (mark: string): string => `<tr><th>Mark:</th><td>${mark}</td></tr>`;

export const ownerRow = (owner: string): string =>
  `<tr><th>Owned by:</th><td>${owner}</td></tr>`;

export const sectionRow = (label: string): string => `<tr><td class="t2b">${label}</td></tr>`;

export const headingRow = (label: string): string => `<tr><th class="t3">${label}</th></tr>`;

export const partyNameRow = (name: string): string =>
  `<tr><th class="t3">Name:</th><td><a href="?pnam=${encodeURIComponent(name)}">${name}</a></td></tr>`;

export const otherRow = (label: string, value: string): string =>
  `<tr><th>${label}</th><td>${value}</td></tr>`;

export const PLEADED_HEADING = headingRow("Pleaded applications and registrations");
