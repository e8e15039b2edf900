import { MarkType } from "../types/opposition-interface";
import designKeywords from "./design-keywords.json";

export interface VisualLabel {
  text: string;
  confidence: number;
}

/** What the vision model saw in a mark image. */
export interface VisionReport {
  detectedText: string;
  hasLogo: boolean;
  hasDesign: boolean;
  visualLabels: VisualLabel[];
}

export const NO_IMAGE_PHRASE = "no image exists";

const ELEMENT_CONFIDENCE = 0.8;
const COMPLEXITY_CONFIDENCE = 0.9;
const KEYWORD_MIN_CONFIDENCE = 0.3;
const WORD = /\b[a-zA-Z0-9]+\b/g;

export const VISION_PROMPT = `Analyze this trademark image and provide:
1. All text detected in the image (word for word)
2. Whether there are any logos, symbols, or graphic design elements
3. Visual characteristics: font styling, colors, decorative elements, shapes, patterns
4. Overall visual complexity (simple/moderate/complex)

Format your response as:
TEXT: [all text found]
HAS_LOGO: [yes/no]
HAS_DESIGN: [yes/no]
VISUAL_ELEMENTS: [list of visual characteristics]
COMPLEXITY: [simple/moderate/complex]`;

const valueAfter = (line: string, prefix: string): string =>
  line.slice(prefix.length).trim();

/**
 * Reads the labeled-line answer. Lines may come in any order or not at all;
 * missing ones leave their field empty or false.
 */
export function parseVisionResponse(text: string): VisionReport {
  const report: VisionReport = {
    detectedText: "",
    hasLogo: false,
    hasDesign: false,
    visualLabels: [],
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();

    if (line.startsWith("TEXT:")) {
      report.detectedText = valueAfter(line, "TEXT:");
    } else if (line.startsWith("HAS_LOGO:")) {
      report.hasLogo = line.toLowerCase().includes("yes");
    } else if (line.startsWith("HAS_DESIGN:")) {
      report.hasDesign = line.toLowerCase().includes("yes");
    } else if (line.startsWith("VISUAL_ELEMENTS:")) {
      valueAfter(line, "VISUAL_ELEMENTS:")
        .toLowerCase()
        .split(",")
        .map((element) => element.trim())
        .filter((element) => element.length > 0)
        .forEach((element) =>
          report.visualLabels.push({ text: element, confidence: ELEMENT_CONFIDENCE })
        );
    } else if (line.startsWith("COMPLEXITY:")) {
      const complexity = valueAfter(line, "COMPLEXITY:").toLowerCase();
      if (complexity.includes("complex") || complexity.includes("moderate")) {
        report.visualLabels.push(
          { text: "complex", confidence: COMPLEXITY_CONFIDENCE },
          { text: "design", confidence: COMPLEXITY_CONFIDENCE }
        );
      }
    }
  }

  return report;
}

export const countWords = (text: string): number => text.match(WORD)?.length ?? 0;

const mentionsNoImage = (text: string): boolean =>
  text.toLowerCase().includes(NO_IMAGE_PHRASE);

const hasStylingLabel = (labels: VisualLabel[]): boolean =>
  labels.some(
    (label) =>
      label.confidence > KEYWORD_MIN_CONFIDENCE &&
      designKeywords.some((keyword) => label.text.includes(keyword))
  );

/**
 * First matching rule wins. Anything the rules cannot place is
 * StylizedOrDesign; NoImage only ever comes from the placeholder phrase.
 */
export function classifyVisionReport(report: VisionReport): MarkType {
  if (mentionsNoImage(report.detectedText)) return MarkType.NoImage;

  const words = countWords(report.detectedText);
  const labels = report.visualLabels.length;

  if (words === 0) return MarkType.StylizedOrDesign;
  if (report.hasLogo) return MarkType.StylizedOrDesign;
  if (labels >= 3) return MarkType.StylizedOrDesign;
  if (hasStylingLabel(report.visualLabels)) return MarkType.StylizedOrDesign;

  if (words >= 3) {
    return labels <= 2 ? MarkType.Slogan : MarkType.StylizedOrDesign;
  }
  if (words <= 2) {
    return labels <= 1 ? MarkType.StandardText : MarkType.StylizedOrDesign;
  }

  return MarkType.StylizedOrDesign;
}

/** OCR has no styling signal, so only the placeholder and word count count. */
export function classifyOcrText(text: string): MarkType {
  if (mentionsNoImage(text)) return MarkType.NoImage;

  const words = countWords(text);
  if (words === 0) return MarkType.StylizedOrDesign;
  return words >= 3 ? MarkType.Slogan : MarkType.StandardText;
}
