import { ClassifiedDocument } from "../types/document-interface";
import {
  MarkReference,
  OwnerSide,
  PartyNames,
} from "../types/opposition-interface";
import { extractMarkName } from "./field-extractor";
import { locatePleadedSection } from "./section-locator";
import { TTABVUE_LAYOUT } from "./ttabvue-layout";

type PartySide = "plaintiff" | "defendant";

interface PartyScanState extends PartyNames {
  currentParty: PartySide | null;
}

interface MarkScanState {
  currentOwner: OwnerSide;
  marks: MarkReference[];
  seen: ReadonlySet<string>;
}

function partyForSection(label: string): PartySide | null {
  if (label === TTABVUE_LAYOUT.plaintiffSection) return "plaintiff";
  if (label === TTABVUE_LAYOUT.defendantSection) return "defendant";
  return null;
}

/**
 * One forward pass over every row of every table. A "Plaintiff" or
 * "Defendant" section row opens that party's block, any other section row
 * closes it, and the first party-name link inside a block names the party.
 */
export function resolveParties(document: ClassifiedDocument): PartyNames {
  const rows = document.tables.flatMap((table) => table.rows);

  const result = rows.reduce<PartyScanState>(
    (state, row) => {
      const tag = row.tag;
      switch (tag.kind) {
        case "section_break":
          return { ...state, currentParty: partyForSection(tag.label) };
        case "party_name":
          if (state.currentParty === "plaintiff" && state.plaintiffName === null) {
            return { ...state, plaintiffName: tag.name };
          }
          if (state.currentParty === "defendant" && state.defendantName === null) {
            return { ...state, defendantName: tag.name };
          }
          return state;
        default:
          return state;
      }
    },
    { currentParty: null, plaintiffName: null, defendantName: null }
  );

  return {
    plaintiffName: result.plaintiffName,
    defendantName: result.defendantName,
  };
}

/**
 * Side of an "Owned by:" value, matched case-insensitively against the
 * resolved party names. An owner matching neither party leaves the current
 * side in place.
 */
export function assignOwner(
  current: OwnerSide,
  ownerText: string,
  parties: PartyNames
): OwnerSide {
  const owner = ownerText.toLowerCase();

  if (parties.plaintiffName && owner.includes(parties.plaintiffName.toLowerCase())) {
    return "plaintiff";
  }
  if (parties.defendantName && owner.includes(parties.defendantName.toLowerCase())) {
    return "defendant";
  }
  return current;
}

/**
 * Marks of the pleaded applications section in document order, each tagged
 * with the owner side in force when its serial row was reached. The first
 * occurrence of a serial number wins.
 */
export function extractPleadedMarks(
  document: ClassifiedDocument,
  parties: PartyNames
): MarkReference[] {
  const section = locatePleadedSection(document);
  if (!section) return [];

  const rows = document.tables[section.tableIndex].rows;
  let state: MarkScanState = { currentOwner: "unknown", marks: [], seen: new Set() };

  for (let i = section.startRowIndex + 1; i < section.endRowIndex; i++) {
    const tag = rows[i].tag;

    if (tag.kind === "owner") {
      state = { ...state, currentOwner: assignOwner(state.currentOwner, tag.owner, parties) };
    } else if (tag.kind === "serial" && !state.seen.has(tag.serialNumber)) {
      const mark: MarkReference = {
        serialNumber: tag.serialNumber,
        markName: extractMarkName(rows, i, section.endRowIndex),
        ownerSide: state.currentOwner,
      };
      state = {
        ...state,
        marks: [...state.marks, mark],
        seen: new Set([...state.seen, tag.serialNumber]),
      };
    }
  }

  return state.marks;
}
