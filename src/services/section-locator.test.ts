import { describe, expect, it } from "vitest";
import {
  headingContains,
  locatePleadedSection,
  locateSection,
  sectionRows,
} from "./section-locator";
import {
  PLEADED_HEADING,
  classifiedTables,
  markRow,
  otherRow,
  sectionRow,
  serialRow,
} from "../__fixtures__/html";

describe("locatePleadedSection", () => {
  it("ends the section at the next major-section row", () => {
    const document = classifiedTables(
      [
        sectionRow("Plaintiff"),
        PLEADED_HEADING,
        serialRow("87654321"),
        markRow("ACME"),
        sectionRow("Defendant"),
        serialRow("76543210"),
      ].join("")
    );

    const section = locatePleadedSection(document);

    expect(section).toEqual({
      name: "Pleaded applications and registrations",
      tableIndex: 0,
      startRowIndex: 1,
      endRowIndex: 4,
    });
    expect(section && sectionRows(document, section).map((row) => row.text)).toEqual([
      "Serial #: 87654321",
      "Mark: ACME",
    ]);
  });

  it("ends the section at a row mentioning the prosecution history", () => {
    const document = classifiedTables(
      [PLEADED_HEADING, serialRow("87654321"), otherRow("See", "Prosecution History")].join("")
    );

    expect(locatePleadedSection(document)?.endRowIndex).toBe(2);
  });

  it("runs to the end of the table when nothing ends it", () => {
    const document = classifiedTables(
      otherRow("Number:", "91234567"),
      [PLEADED_HEADING, serialRow("87654321"), markRow("ACME")].join("")
    );

    expect(locatePleadedSection(document)).toMatchObject({
      tableIndex: 1,
      startRowIndex: 0,
      endRowIndex: 3,
    });
  });

  it("honours only the first matching heading", () => {
    const document = classifiedTables(
      [PLEADED_HEADING, serialRow("87654321")].join(""),
      [PLEADED_HEADING, serialRow("76543210")].join("")
    );

    expect(locatePleadedSection(document)?.tableIndex).toBe(0);
  });

  it("returns null when no heading matches", () => {
    expect(locatePleadedSection(classifiedTables(serialRow("87654321")))).toBeNull();
  });
});

describe("locateSection", () => {
  it("matches headings case-insensitively", () => {
    const document = classifiedTables(PLEADED_HEADING);

    expect(
      locateSection(document, "pleaded", headingContains("PLEADED APPLICATIONS"))
    ).toEqual({ name: "pleaded", tableIndex: 0, startRowIndex: 0, endRowIndex: 1 });
  });
});
