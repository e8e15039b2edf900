/**
 * Markers of the TTABVue proceeding page layout. The page has no documented
 * schema; these are the heuristics the extractors key on.
 */
export const TTABVUE_LAYOUT = {
  /** Sub-heading cells, e.g. "Pleaded applications and registrations", "Name:". */
  headingCellClass: "t3",
  /** Major-section cells, e.g. "Plaintiff", "Defendant", "Prosecution History". */
  sectionCellClass: "t2b",
  sectionTerminator: "prosecution history",
  pleadedHeading: "pleaded applications and registrations",
  plaintiffSection: "Plaintiff",
  defendantSection: "Defendant",
  serialLabel: "Serial #:",
  markLabel: "Mark:",
  ownerLabel: "Owned by:",
  partyNameLabel: "Name:",
  partyNameMarker: "pnam=",
  caseStatusHost: "tsdr.uspto.gov",
  caseNumberParam: "caseNumber=",
  filingDateLabel: "filing date",
  filedAndFeeEntry: "FILED AND FEE",
  sustainedKeyword: "SUSTAINED",
  dismissedKeyword: "DISMISSED",
  proceedingNumberParam: "pno=",
  oppositionType: "OPP",
} as const;

export const MARK_NAME_LOOKAHEAD = 4;
export const UNKNOWN_MARK_NAME = "Unknown";
