import path from "path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { languageDataPath, TesseractOcrEngine } from "./ocr-engine";

const { createWorker, recognize, terminate } = vi.hoisted(() => ({
  createWorker: vi.fn(),
  recognize: vi.fn(),
  terminate: vi.fn(),
}));

vi.mock("tesseract.js", () => ({
  OEM: { LSTM_ONLY: 1 },
  createWorker,
}));

describe("languageDataPath", () => {
  it("points at the installed English model", () => {
    expect(languageDataPath("eng").split(path.sep).slice(-3)).toEqual([
      "@tesseract.js-data",
      "eng",
      "4.0.0_best_int",
    ]);
  });
});

describe("TesseractOcrEngine", () => {
  beforeEach(() => {
    createWorker.mockReset();
    recognize.mockReset();
    terminate.mockReset();
    createWorker.mockResolvedValue({ recognize, terminate });
  });

  it("starts one worker on local language data", async () => {
    recognize.mockResolvedValue({ data: { text: "  ACME\n" } });
    const engine = new TesseractOcrEngine("eng");

    await expect(engine.recognize(Buffer.from("a"))).resolves.toBe("ACME");
    await expect(engine.recognize(Buffer.from("b"))).resolves.toBe("ACME");

    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(createWorker).toHaveBeenCalledWith("eng", 1, {
      langPath: languageDataPath("eng"),
      gzip: true,
    });
  });

  it("terminates the worker once", async () => {
    recognize.mockResolvedValue({ data: { text: "ACME" } });
    const engine = new TesseractOcrEngine("eng");
    await engine.recognize(Buffer.from("a"));

    await engine.terminate();
    await engine.terminate();

    expect(terminate).toHaveBeenCalledTimes(1);
  });
});
