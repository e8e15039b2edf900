export interface AppConfig {
  port: number;
  corsOrigins: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  usptoApiKey: string;
  tsdrApiBaseUrl: string;
  ttabvueBaseUrl: string;
  anthropicApiKey: string;
  visionModel: string;
  ocrLanguage: string;
  requestTimeoutMs: number;
  caseStatusTimeoutMs: number;
  interRequestDelayMs: number;
  oppositionDelayMs: number;
  classRetryAttempts: number;
  classRetryBaseDelayMs: number;
  outputDir: string;
}

export class AppError extends Error {
  constructor(
    public override message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = "AppError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message: string;
  error?: string;
}

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogContext {
  action?: string;
  requestId?: string;
  jobId?: string;
  jobKind?: string;
  oppositionNumber?: string;
  proceedingType?: string;
  serialNumber?: string;
  url?: string;
  method?: string;
  path?: string;
  ip?: string;
  userAgent?: string;
  status?: string | number;
  statusCode?: number;
  statusText?: string;
  timeout?: number;
  dataLength?: number;
  attempt?: number;
  maxAttempts?: number;
  delayMs?: number;
  errorTag?: string;
  reason?: string;
  success?: boolean;
  responseTime?: number;
  duration?: number;
  strategy?: string;
  markType?: number;
  marks?: number;
  failures?: number;
  progress?: number;
  fileName?: string;
  format?: string;
  port?: number;
  environment?: string;
  pid?: number;
  promise?: string;
}
