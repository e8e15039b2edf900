import logger from "../utils/logger";
import { MarkType } from "../types/opposition-interface";
import { normalizeImage } from "./image-format";
import { OcrEngine } from "./ocr-engine";
import { VisionModel } from "./vision-model";
import {
  classifyOcrText,
  classifyVisionReport,
  parseVisionResponse,
} from "./vision-report";

/**
 * One way of deciding a mark type. Returns null when it has nothing to say;
 * may throw, in which case the chain moves on.
 */
export interface MarkTypeStrategy {
  readonly name: string;
  classify(image: Buffer, serialNumber: string): Promise<MarkType | null>;
  close?(): Promise<void>;
}

export class VisionMarkStrategy implements MarkTypeStrategy {
  public readonly name = "vision";

  constructor(private model: VisionModel) {}

  public async classify(image: Buffer): Promise<MarkType> {
    const normalized = await normalizeImage(image);
    const answer = await this.model.describe(normalized.data, normalized.mediaType);
    return classifyVisionReport(parseVisionResponse(answer));
  }
}

export class OcrMarkStrategy implements MarkTypeStrategy {
  public readonly name = "ocr";

  constructor(private engine: OcrEngine) {}

  public async classify(image: Buffer): Promise<MarkType> {
    return classifyOcrText(await this.engine.recognize(image));
  }

  public async close(): Promise<void> {
    await this.engine.terminate?.();
  }
}

export const FALLBACK_MARK_TYPE = MarkType.StylizedOrDesign;

/** Tries each strategy in order; when none decides, StylizedOrDesign. */
export class MarkClassifier {
  constructor(private strategies: readonly MarkTypeStrategy[]) {}

  public async classify(image: Buffer, serialNumber: string): Promise<MarkType> {
    for (const strategy of this.strategies) {
      try {
        const markType = await strategy.classify(image, serialNumber);
        if (markType !== null) {
          logger.markClassified(serialNumber, markType, strategy.name);
          return markType;
        }
      } catch (error) {
        logger.warn("Mark classification strategy failed", {
          action: "mark_strategy_failed",
          serialNumber,
          strategy: strategy.name,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.markClassified(serialNumber, FALLBACK_MARK_TYPE, "default");
    return FALLBACK_MARK_TYPE;
  }

  public async close(): Promise<void> {
    for (const strategy of this.strategies) {
      await strategy.close?.();
    }
  }
}
