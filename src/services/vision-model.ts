import Anthropic from "@anthropic-ai/sdk";
import config from "../config/config";
import { AppError } from "../types/global-interface";
import { ImageMediaType } from "./image-format";
import { VISION_PROMPT } from "./vision-report";

const MAX_TOKENS = 1024;

/** Describes a mark image as labeled lines (TEXT:, HAS_LOGO:, ...). */
export interface VisionModel {
  describe(image: Buffer, mediaType: ImageMediaType): Promise<string>;
}

export class AnthropicVisionModel implements VisionModel {
  private client: Anthropic;

  constructor(
    apiKey: string = config.get("anthropicApiKey"),
    private model: string = config.get("visionModel")
  ) {
    this.client = new Anthropic({ apiKey });
  }

  public async describe(image: Buffer, mediaType: ImageMediaType): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: {
                type: "base64",
                media_type: mediaType,
                data: image.toString("base64"),
              },
            },
            { type: "text", text: VISION_PROMPT },
          ],
        },
      ],
    });

    for (const block of response.content) {
      if (block.type === "text") return block.text;
    }

    throw new AppError("Vision model returned no text", 502, "VISION_EMPTY_RESPONSE");
  }
}
