import { AxiosInstance } from "axios";
import Joi from "joi";
import config from "../config/config";
import logger from "../utils/logger";
import { exponentialBackoff, RetryPolicy, withRetry } from "../utils/retry";
import {
  ClassRetrievalResult,
  ClassSet,
  TrademarkClass,
} from "../types/opposition-interface";
import {
  createHttpClient,
  describeHttpError,
  isRetryableHttpError,
} from "./http-client";

interface CaseStatusClassEntry {
  code: string | number;
  description?: string | null;
}

interface CaseStatusGoodsServices {
  usClasses?: CaseStatusClassEntry[];
  internationalClasses?: CaseStatusClassEntry[];
  description?: string | null;
}

interface CaseStatusTrademark {
  gsList?: CaseStatusGoodsServices[];
  status?: { filingDate?: string | null };
}

interface CaseStatusPayload {
  trademarks: CaseStatusTrademark[];
}

const classEntrySchema = Joi.object<CaseStatusClassEntry>({
  code: Joi.alternatives().try(Joi.string(), Joi.number()).required(),
  description: Joi.string().allow("", null),
}).unknown(true);

const caseStatusSchema = Joi.object<CaseStatusPayload>({
  trademarks: Joi.array()
    .items(
      Joi.object({
        gsList: Joi.array().items(
          Joi.object({
            usClasses: Joi.array().items(classEntrySchema),
            internationalClasses: Joi.array().items(classEntrySchema),
            description: Joi.string().allow("", null),
          }).unknown(true)
        ),
        status: Joi.object({
          filingDate: Joi.string().allow("", null),
        }).unknown(true),
      }).unknown(true)
    )
    .min(1)
    .required(),
}).unknown(true);

export const emptyClassSet = (): ClassSet => ({
  usClasses: [],
  internationalClasses: [],
  description: "",
  filingDate: "",
});

function uniqueClasses(
  entries: CaseStatusClassEntry[],
  target: TrademarkClass[],
  seen: Set<string>
): void {
  for (const entry of entries) {
    const code = String(entry.code);
    if (seen.has(code)) continue;
    seen.add(code);
    target.push({ code, description: entry.description ?? "" });
  }
}

/**
 * Reads the goods/services list of a case-status payload. Class codes are
 * de-duplicated by code in first-seen order; descriptions are joined with
 * " | ". A payload of the wrong shape yields an empty set.
 */
export function parseCaseStatus(payload: unknown, serialNumber?: string): ClassSet {
  const { error, value } = caseStatusSchema.validate(payload);
  if (error || !value) {
    logger.warn("Unexpected case status payload", {
      serialNumber,
      reason: error?.message,
    });
    return emptyClassSet();
  }

  const trademark = value.trademarks[0];
  const classes = emptyClassSet();
  const seenUs = new Set<string>();
  const seenInternational = new Set<string>();
  const descriptions: string[] = [];

  for (const goodsServices of trademark.gsList ?? []) {
    uniqueClasses(goodsServices.usClasses ?? [], classes.usClasses, seenUs);
    uniqueClasses(
      goodsServices.internationalClasses ?? [],
      classes.internationalClasses,
      seenInternational
    );
    if (goodsServices.description) {
      descriptions.push(goodsServices.description);
    }
  }

  classes.description = descriptions.join(" | ");
  classes.filingDate = trademark.status?.filingDate ?? "";
  return classes;
}

export interface CaseStatusClientOptions {
  http?: AxiosInstance;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class CaseStatusClient {
  private http: AxiosInstance;
  private retryPolicy: RetryPolicy;
  private classTimeoutMs: number;
  private imageTimeoutMs: number;

  constructor(options: CaseStatusClientOptions = {}) {
    this.classTimeoutMs = config.get("caseStatusTimeoutMs");
    this.imageTimeoutMs = config.get("requestTimeoutMs");
    this.http =
      options.http ??
      createHttpClient({
        service: "Case status API",
        baseURL: config.get("tsdrApiBaseUrl"),
        timeout: this.imageTimeoutMs,
        headers: { "USPTO-API-KEY": config.get("usptoApiKey") },
      });

    this.retryPolicy = {
      maxAttempts: options.retryAttempts ?? config.get("classRetryAttempts"),
      backoffMs: exponentialBackoff(
        options.retryBaseDelayMs ?? config.get("classRetryBaseDelayMs")
      ),
      isRetryable: isRetryableHttpError,
      sleep: options.sleep,
      onRetry: (error, attempt, delayMs) => {
        logger.warn("Retrying case status request", {
          action: "case_status_retry",
          errorTag: describeHttpError(error),
          attempt,
          maxAttempts: this.retryPolicy.maxAttempts,
          delayMs,
        });
      },
    };
  }

  /**
   * Classes of one serial number. Failures come back as a tag and are never
   * thrown, so one bad serial does not stop the rest of a batch.
   */
  public async fetchClasses(serialNumber: string): Promise<ClassRetrievalResult> {
    const startTime = Date.now();
    const url = `/casestatus/sn${serialNumber}/info.json`;

    let payload: unknown;
    try {
      const response = await withRetry(
        () => this.http.get<unknown>(url, { timeout: this.classTimeoutMs }),
        this.retryPolicy
      );
      payload = response.data;
    } catch (error) {
      const tag = describeHttpError(error);
      logger.caseStatusCall(serialNumber, false, Date.now() - startTime);
      logger.warn("Class retrieval failed", {
        action: "class_retrieval_failed",
        serialNumber,
        errorTag: tag,
      });
      return { ok: false, error: tag };
    }

    logger.caseStatusCall(serialNumber, true, Date.now() - startTime);
    return { ok: true, classes: parseCaseStatus(payload, serialNumber) };
  }

  /** Raw mark image bytes. Errors propagate to the caller. */
  public async fetchMarkImage(serialNumber: string): Promise<Buffer> {
    const response = await this.http.get<ArrayBuffer>(`/rawImage/${serialNumber}`, {
      responseType: "arraybuffer",
      timeout: this.imageTimeoutMs,
    });
    return Buffer.from(response.data);
  }
}
