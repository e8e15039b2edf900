import { Request, Response, NextFunction } from "express";
import { isAfter } from "date-fns";
import Joi from "joi";
import config from "../config/config";
import logger from "../utils/logger";
import { parseUsDate } from "../utils/date-utils";
import { ApiResponse, AppError } from "../types/global-interface";
import { DateRange } from "../types/opposition-interface";
import { BatchJob, BatchJobStore } from "../services/batch-job-store";
import { ExportService } from "../services/export-service";
import { analyzeOpposition, OppositionScraper } from "../services/opposition-scraper";
import { TTABVUE_LAYOUT } from "../services/ttabvue-layout";

const US_DATE = /^\d{2}\/\d{2}\/\d{4}$/;

const proceedingNumber = Joi.string()
  .pattern(/^\d{8}$/)
  .required()
  .messages({ "string.pattern.base": "Proceeding number must be 8 digits" });

const usDate = Joi.string()
  .pattern(US_DATE)
  .custom((value: string, helpers) => (parseUsDate(value) ? value : helpers.error("date.calendar")))
  .messages({
    "string.pattern.base": "Dates must be MM/DD/YYYY",
    "date.calendar": "{{#label}} is not a calendar date",
  });

const dateRangeKeys = { startDate: usDate, endDate: usDate };

const orderedRange = (range: DateRange, helpers: Joi.CustomHelpers) => {
  const start = range.startDate ? parseUsDate(range.startDate) : null;
  const end = range.endDate ? parseUsDate(range.endDate) : null;
  return start && end && isAfter(start, end) ? helpers.error("dateRange.order") : range;
};

const dateRangeMessages = { "dateRange.order": "startDate must not be after endDate" };

// Only pages on the configured TTABVue host are fetched on a caller's behalf.
const ttabvueHost = new URL(config.get("ttabvueBaseUrl")).host;

const ttabvueUrl = Joi.string()
  .uri({ scheme: ["http", "https"] })
  .custom((value: string, helpers) =>
    new URL(value).host === ttabvueHost ? value : helpers.error("url.host")
  )
  .messages({ "url.host": `URL must point at ${ttabvueHost}` })
  .required();

const proceedingTypeSchema = Joi.object<{ type: string }>({
  type: Joi.string().uppercase().pattern(/^[A-Z]{3}$/).default(TTABVUE_LAYOUT.oppositionType),
});

const analysisQuerySchema = Joi.object<{ company: string; type: string }>({
  company: Joi.string().trim().min(1).required(),
  type: Joi.string().uppercase().pattern(/^[A-Z]{3}$/).default(TTABVUE_LAYOUT.oppositionType),
});

const exportQuerySchema = Joi.object<{ format: "xlsx" | "json" | "row"; type: string }>({
  format: Joi.string().valid("xlsx", "json", "row").default("xlsx"),
  type: Joi.string().uppercase().pattern(/^[A-Z]{3}$/).default(TTABVUE_LAYOUT.oppositionType),
});

const urlBatchSchema = Joi.object<{ url: string } & DateRange>({
  url: ttabvueUrl,
  ...dateRangeKeys,
})
  .custom(orderedRange)
  .messages(dateRangeMessages);

const partyBatchSchema = Joi.object<{ partyName: string } & DateRange>({
  partyName: Joi.string().trim().min(1).max(200).required(),
  ...dateRangeKeys,
})
  .custom(orderedRange)
  .messages(dateRangeMessages);

const analysisBatchSchema = Joi.object<
  { url: string; companyName: string; gvkey?: string } & DateRange
>({
  url: ttabvueUrl,
  companyName: Joi.string().trim().min(1).max(200).required(),
  gvkey: Joi.string().trim().max(20),
  ...dateRangeKeys,
})
  .custom(orderedRange)
  .messages(dateRangeMessages);

function validate<T>(schema: Joi.AnySchema<T>, input: unknown): T {
  const result = schema.validate(input);
  if (result.error) {
    throw new AppError(result.error.details[0].message, 400, "VALIDATION_ERROR");
  }
  return result.value;
}

const numberParam = (req: Request): string => validate(proceedingNumber, req.params.number);

const jobView = (job: BatchJob) => ({
  jobId: job.id,
  kind: job.kind,
  status: job.status,
  progress: job.progress,
  message: job.message,
  createdAt: job.createdAt,
  completedAt: job.completedAt,
  errorMessage: job.errorMessage,
  result: job.outcome?.result ?? null,
});

export class OppositionController {
  constructor(
    private scraper: OppositionScraper = new OppositionScraper(),
    private exporter: ExportService = ExportService.getInstance(),
    private jobs: BatchJobStore = BatchJobStore.getInstance()
  ) {}

  public healthCheck = async (req: Request, res: Response): Promise<void> => {
    const response: ApiResponse = {
      success: true,
      data: {
        status: "healthy",
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        jobs: this.jobs.size(),
      },
      message: "Service is healthy",
    };
    res.json(response);
  };

  public getOpposition = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const number = numberParam(req);
      const { type } = validate(proceedingTypeSchema, req.query);

      const record = await this.scraper.scrapeOpposition(number, type);

      const response: ApiResponse = {
        success: true,
        data: record,
        message: `Found ${record.marks.length} pleaded marks`,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  };

  public analyzeOpposition = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const number = numberParam(req);
      const { company, type } = validate(analysisQuerySchema, req.query);

      const record = await this.scraper.scrapeOpposition(number, type);

      const response: ApiResponse = {
        success: true,
        data: analyzeOpposition(record, company),
        message: "Opposition analysed",
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  };

  public exportOpposition = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const number = numberParam(req);
      const { format, type } = validate(exportQuerySchema, req.query);

      const record = await this.scraper.scrapeOpposition(number, type);
      logger.info("Exporting opposition", {
        action: "opposition_export",
        oppositionNumber: number,
        format,
      });

      if (format === "json") {
        res.setHeader(
          "Content-Disposition",
          `attachment; filename="opposition_${number}_classes.json"`
        );
        res.type("application/json").send(this.exporter.toJson(record));
        return;
      }

      if (format === "row") {
        res.type("text/plain").send(this.exporter.summaryRow(record));
        return;
      }

      const { buffer, fileName } = this.exporter.generateOppositionWorkbook(record);
      this.sendWorkbook(res, buffer, fileName);
    } catch (error) {
      next(error);
    }
  };

  public startUrlBatch = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { url, startDate, endDate } = validate(urlBatchSchema, req.body);

      const { job } = this.jobs.start("url", async (onProgress) => ({
        kind: "scrape",
        result: await this.scraper.scrapeOppositionsFromUrl(
          url,
          { startDate, endDate },
          onProgress
        ),
      }));

      this.accepted(res, job, "Batch scrape started");
    } catch (error) {
      next(error);
    }
  };

  public startPartyBatch = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { partyName, startDate, endDate } = validate(partyBatchSchema, req.body);

      const { job } = this.jobs.start("party", async (onProgress) => ({
        kind: "scrape",
        result: await this.scraper.scrapePartyOppositions(
          partyName,
          { startDate, endDate },
          onProgress
        ),
      }));

      this.accepted(res, job, `Batch scrape started for ${partyName}`);
    } catch (error) {
      next(error);
    }
  };

  public startAnalysisBatch = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { url, companyName, gvkey, startDate, endDate } = validate(
        analysisBatchSchema,
        req.body
      );

      const { job } = this.jobs.start("analysis", async (onProgress) => ({
        kind: "analysis",
        result: await this.scraper.batchAnalyzeOppositions(
          url,
          companyName,
          gvkey ?? null,
          { startDate, endDate },
          onProgress
        ),
      }));

      this.accepted(res, job, `Batch analysis started for ${companyName}`);
    } catch (error) {
      next(error);
    }
  };

  public getJobStatus = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const job = this.findJob(req.params.jobId);
      const response: ApiResponse = {
        success: true,
        data: jobView(job),
        message: "Job status retrieved successfully",
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  };

  public downloadResults = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const job = this.findJob(req.params.jobId);
      if (job.status !== "completed" || !job.outcome) {
        throw new AppError("Job is not completed yet", 409, "JOB_NOT_COMPLETED");
      }

      const { buffer, fileName } =
        job.outcome.kind === "analysis"
          ? this.exporter.generateAnalysisWorkbook(job.outcome.result)
          : this.exporter.generateBatchWorkbook(job.outcome.result);

      logger.info("Batch results downloaded", {
        action: "batch_download",
        jobId: job.id,
        fileName,
      });
      this.sendWorkbook(res, buffer, fileName);
    } catch (error) {
      next(error);
    }
  };

  private findJob(jobId: string | undefined): BatchJob {
    if (!jobId) {
      throw new AppError("Job ID is required", 400, "JOB_ID_MISSING");
    }
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new AppError("Job not found", 404, "JOB_NOT_FOUND");
    }
    return job;
  }

  private accepted(res: Response, job: BatchJob, message: string): void {
    const response: ApiResponse = {
      success: true,
      data: { jobId: job.id, status: job.status },
      message,
    };
    res.status(202).json(response);
  }

  private sendWorkbook(res: Response, buffer: Buffer, fileName: string): void {
    res.setHeader(
      "Content-Type",
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
    res.setHeader("Content-Length", buffer.length);
    res.send(buffer);
  }
}
