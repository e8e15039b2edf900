export type OwnerSide = "plaintiff" | "defendant" | "unknown";

export type Outcome = "sustained" | "dismissed" | "pending";

export enum MarkType {
  NoImage = 0,
  StandardText = 1,
  StylizedOrDesign = 2,
  Slogan = 3,
}

export const MARK_TYPE_LABELS: Record<MarkType, string> = {
  [MarkType.NoImage]: "No Image",
  [MarkType.StandardText]: "Standard Text",
  [MarkType.StylizedOrDesign]: "Stylized/Design",
  [MarkType.Slogan]: "Slogan",
};

export interface MarkReference {
  serialNumber: string;
  markName: string;
  ownerSide: OwnerSide;
}

export interface PartyNames {
  plaintiffName: string | null;
  defendantName: string | null;
}

export interface TrademarkClass {
  code: string;
  description: string;
}

export interface ClassSet {
  usClasses: TrademarkClass[];
  internationalClasses: TrademarkClass[];
  description: string;
  filingDate: string;
}

export type ClassRetrievalResult =
  | { ok: true; classes: ClassSet }
  | { ok: false; error: string };

export interface OppositionTimeline {
  filingDate: string | null;
  terminationDate: string | null;
  outcome: Outcome;
}

export interface OppositionFacts {
  parties: PartyNames;
  marks: MarkReference[];
  timeline: OppositionTimeline;
}

export interface PleadedMark extends MarkReference {
  classes: ClassSet;
  markType: MarkType;
  error: string | null;
}

export interface MarkFailure {
  serialNumber: string;
  markName: string;
  error: string;
}

export interface OppositionRecord {
  oppositionNumber: string;
  proceedingType: string;
  parties: PartyNames;
  plaintiffSerials: string[];
  defendantSerials: string[];
  marks: PleadedMark[];
  timeline: OppositionTimeline;
  uniqueUsClasses: string[];
  uniqueInternationalClasses: string[];
  totalUsClasses: number;
  totalInternationalClasses: number;
  markTypeCounts: Record<MarkType, number>;
  failedSerials: MarkFailure[];
}

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

export interface ProceedingListing {
  proceedingNumber: string;
  proceedingType: string;
  filingDate: string | null;
}

export interface ProceedingFailure {
  proceedingNumber: string;
  error: string;
}

export interface BatchScrapeResult {
  source: string;
  listings: ProceedingListing[];
  records: OppositionRecord[];
  failures: ProceedingFailure[];
  totalSerialCount: number;
  uniqueUsClasses: string[];
  uniqueInternationalClasses: string[];
  totalUsClasses: number;
  totalInternationalClasses: number;
}

export interface MarkDetail {
  serialNumber: string;
  markName: string;
  markType: MarkType;
}

export interface OppositionAnalysis {
  oppositionNumber: string;
  companyName: string;
  gvkey: string | null;
  altName: string | null;
  plaintiff: 0 | 1;
  marks: number;
  usClassCount: number;
  internationalClassCount: number;
  startDate: string | null;
  endDate: string | null;
  outcome: Outcome;
  tmTypeCounts: { standard: number; stylized: number; slogan: number };
  markDetails: MarkDetail[];
}

export interface BatchAnalysisResult {
  companyName: string;
  gvkey: string | null;
  listings: ProceedingListing[];
  analyses: OppositionAnalysis[];
  failures: ProceedingFailure[];
}

export type ProgressCallback = (progress: number, message: string) => void;
