import config from "../config/config";
import logger from "../utils/logger";
import { MarkType } from "../types/opposition-interface";
import { CaseStatusClient } from "./case-status-client";
import { describeHttpError } from "./http-client";
import {
  FALLBACK_MARK_TYPE,
  MarkClassifier,
  MarkTypeStrategy,
  OcrMarkStrategy,
  VisionMarkStrategy,
} from "./mark-classifier";
import { TesseractOcrEngine } from "./ocr-engine";
import { AnthropicVisionModel } from "./vision-model";

export interface MarkImageSource {
  fetchMarkImage(serialNumber: string): Promise<Buffer>;
}

/**
 * Vision model first, then OCR. Without an Anthropic key nothing is tried
 * and every mark comes out StylizedOrDesign.
 */
export function defaultStrategies(): MarkTypeStrategy[] {
  const apiKey = config.get("anthropicApiKey");
  if (!apiKey) return [];

  return [
    new VisionMarkStrategy(new AnthropicVisionModel(apiKey)),
    new OcrMarkStrategy(new TesseractOcrEngine()),
  ];
}

export class MarkTypeService {
  private classifier: MarkClassifier;
  private hasStrategies: boolean;

  constructor(
    private images: MarkImageSource = new CaseStatusClient(),
    strategies: readonly MarkTypeStrategy[] = defaultStrategies()
  ) {
    this.classifier = new MarkClassifier(strategies);
    this.hasStrategies = strategies.length > 0;
  }

  public async classifyMark(serialNumber: string): Promise<MarkType> {
    // Nothing could read the image, so it is not downloaded.
    if (!this.hasStrategies) return FALLBACK_MARK_TYPE;

    let image: Buffer;
    try {
      image = await this.images.fetchMarkImage(serialNumber);
    } catch (error) {
      logger.warn("Mark image unavailable", {
        action: "mark_image_failed",
        serialNumber,
        errorTag: describeHttpError(error),
      });
      return FALLBACK_MARK_TYPE;
    }

    return this.classifier.classify(image, serialNumber);
  }

  /** Releases strategy resources such as the OCR worker. */
  public async close(): Promise<void> {
    await this.classifier.close();
  }
}
