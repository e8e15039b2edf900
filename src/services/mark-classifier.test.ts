import { describe, expect, it, vi } from "vitest";
import { MarkType } from "../types/opposition-interface";
import {
  MarkClassifier,
  MarkTypeStrategy,
  OcrMarkStrategy,
  VisionMarkStrategy,
} from "./mark-classifier";
import { MarkTypeService } from "./mark-type-service";
import { OcrEngine } from "./ocr-engine";
import { VisionModel } from "./vision-model";

const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

const strategy = (
  name: string,
  classify: MarkTypeStrategy["classify"]
): MarkTypeStrategy => ({ name, classify: vi.fn(classify) });

describe("VisionMarkStrategy", () => {
  it("classifies the model's answer", async () => {
    const model: VisionModel = {
      describe: vi.fn(async () => "TEXT: BUY MORE NOW\nHAS_LOGO: no\nCOMPLEXITY: simple"),
    };

    await expect(new VisionMarkStrategy(model).classify(JPEG)).resolves.toBe(MarkType.Slogan);
    expect(model.describe).toHaveBeenCalledWith(JPEG, "image/jpeg");
  });
});

describe("OcrMarkStrategy", () => {
  it("classifies recognised text and stops the engine on close", async () => {
    const engine: OcrEngine = {
      recognize: vi.fn(async () => "ACME"),
      terminate: vi.fn(async () => undefined),
    };
    const ocr = new OcrMarkStrategy(engine);

    await expect(ocr.classify(JPEG)).resolves.toBe(MarkType.StandardText);
    await ocr.close();
    expect(engine.terminate).toHaveBeenCalledTimes(1);
  });
});

describe("MarkClassifier", () => {
  it("stops at the first strategy that decides", async () => {
    const vision = strategy("vision", async () => MarkType.Slogan);
    const ocr = strategy("ocr", async () => MarkType.StandardText);

    await expect(new MarkClassifier([vision, ocr]).classify(JPEG, "87654321")).resolves.toBe(
      MarkType.Slogan
    );
    expect(ocr.classify).not.toHaveBeenCalled();
  });

  it("falls back to OCR when the vision model fails", async () => {
    const vision = strategy("vision", async () => {
      throw new Error("overloaded");
    });
    const ocr = strategy("ocr", async () => MarkType.StandardText);

    await expect(new MarkClassifier([vision, ocr]).classify(JPEG, "87654321")).resolves.toBe(
      MarkType.StandardText
    );
  });

  it("defaults to stylized when no strategy decides", async () => {
    const vision = strategy("vision", async () => null);
    const ocr = strategy("ocr", async () => {
      throw new Error("no worker");
    });

    await expect(new MarkClassifier([vision, ocr]).classify(JPEG, "87654321")).resolves.toBe(
      MarkType.StylizedOrDesign
    );
    await expect(new MarkClassifier([]).classify(JPEG, "87654321")).resolves.toBe(
      MarkType.StylizedOrDesign
    );
  });
});

describe("MarkTypeService", () => {
  it("classifies the fetched image", async () => {
    const images = { fetchMarkImage: vi.fn(async () => JPEG) };
    const ocr = strategy("ocr", async () => MarkType.NoImage);

    await expect(new MarkTypeService(images, [ocr]).classifyMark("87654321")).resolves.toBe(
      MarkType.NoImage
    );
    expect(images.fetchMarkImage).toHaveBeenCalledWith("87654321");
    expect(ocr.classify).toHaveBeenCalledWith(JPEG, "87654321");
  });

  it("defaults to stylized when the image cannot be fetched", async () => {
    const images = {
      fetchMarkImage: vi.fn(async (): Promise<Buffer> => {
        throw new Error("not found");
      }),
    };
    const ocr = strategy("ocr", async () => MarkType.StandardText);

    await expect(new MarkTypeService(images, [ocr]).classifyMark("87654321")).resolves.toBe(
      MarkType.StylizedOrDesign
    );
    expect(ocr.classify).not.toHaveBeenCalled();
  });

  it("skips the image download when no strategy is configured", async () => {
    const images = { fetchMarkImage: vi.fn(async () => JPEG) };

    await expect(new MarkTypeService(images, []).classifyMark("87654321")).resolves.toBe(
      MarkType.StylizedOrDesign
    );
    expect(images.fetchMarkImage).not.toHaveBeenCalled();
  });

  it("closes every strategy", async () => {
    const close = vi.fn(async () => undefined);
    const service = new MarkTypeService({ fetchMarkImage: async () => JPEG }, [
      { name: "vision", classify: async () => null, close },
      { name: "ocr", classify: async () => null, close },
    ]);

    await service.close();
    expect(close).toHaveBeenCalledTimes(2);
  });
});
