import path from "path";
import { createWorker, OEM, Worker } from "tesseract.js";
import config from "../config/config";
import logger from "../utils/logger";

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  terminate?(): Promise<void>;
}

/**
 * Directory of the gzipped LSTM model shipped in `@tesseract.js-data/<lang>`.
 * Only the English package is a dependency; other languages need theirs installed.
 */
export function languageDataPath(language: string): string {
  const manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  return path.join(path.dirname(manifest), "4.0.0_best_int");
}

/** Local OCR through a single lazily started tesseract.js worker. */
export class TesseractOcrEngine implements OcrEngine {
  private worker: Worker | null = null;
  private workerInit: Promise<Worker> | null = null;

  constructor(private language: string = config.get("ocrLanguage")) {}

  private async getWorker(): Promise<Worker> {
    if (this.worker) return this.worker;
    if (this.workerInit) return this.workerInit;

    this.workerInit = (async () => {
      logger.info("Starting OCR worker", { action: "ocr_worker_start" });
      const worker = await createWorker(this.language, OEM.LSTM_ONLY, {
        langPath: languageDataPath(this.language),
        gzip: true,
      });
      this.worker = worker;
      return worker;
    })();

    try {
      return await this.workerInit;
    } catch (error) {
      this.workerInit = null;
      throw error;
    }
  }

  public async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text.trim();
  }

  public async terminate(): Promise<void> {
    if (!this.worker) return;
    await this.worker.terminate();
    this.worker = null;
    this.workerInit = null;
    logger.info("OCR worker terminated", { action: "ocr_worker_stop" });
  }
}
