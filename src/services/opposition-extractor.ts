import { ProceedingDocument } from "../types/document-interface";
import { OppositionFacts } from "../types/opposition-interface";
import { extractPleadedMarks, resolveParties } from "./party-resolver";
import { classifyDocument } from "./row-classifier";
import { extractTimeline } from "./timeline-extractor";

/** Everything the page itself says about an opposition. No I/O. */
export function extractOppositionFacts(document: ProceedingDocument): OppositionFacts {
  const classified = classifyDocument(document);
  const parties = resolveParties(classified);

  return {
    parties,
    marks: extractPleadedMarks(classified, parties),
    timeline: extractTimeline(document),
  };
}
