import { AppConfig, AppError } from "../types/global-interface";
import dotenv from "dotenv";

dotenv.config();

const MAX_DELAY_MS = 10000;

class ConfigManager {
  private static instance: ConfigManager;
  private config: AppConfig;

  private constructor() {
    this.config = this.loadConfig();
    this.validateConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    return {
      port: parseInt(process.env.PORT || "3001", 10),
      corsOrigins: (process.env.CORS_ORIGINS || "http://localhost:3000").split(
        ","
      ),
      rateLimitWindowMs: parseInt(
        process.env.RATE_LIMIT_WINDOW_MS || "900000",
        10
      ),
      rateLimitMaxRequests: parseInt(
        process.env.RATE_LIMIT_MAX_REQUESTS || "100",
        10
      ),
      usptoApiKey: process.env.USPTO_API_KEY || "",
      tsdrApiBaseUrl:
        process.env.TSDR_API_BASE_URL || "https://tsdrapi.uspto.gov/ts/cd",
      ttabvueBaseUrl:
        process.env.TTABVUE_BASE_URL || "https://ttabvue.uspto.gov/ttabvue/v",
      anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
      visionModel: process.env.VISION_MODEL || "claude-sonnet-4-20250514",
      ocrLanguage: process.env.OCR_LANGUAGE || "eng",
      requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || "30000", 10),
      caseStatusTimeoutMs: parseInt(
        process.env.CASE_STATUS_TIMEOUT_MS || "60000",
        10
      ),
      interRequestDelayMs: parseInt(
        process.env.INTER_REQUEST_DELAY_MS || "750",
        10
      ),
      oppositionDelayMs: parseInt(process.env.OPPOSITION_DELAY_MS || "500", 10),
      classRetryAttempts: parseInt(process.env.CLASS_RETRY_ATTEMPTS || "3", 10),
      classRetryBaseDelayMs: parseInt(
        process.env.CLASS_RETRY_BASE_DELAY_MS || "1000",
        10
      ),
      outputDir: process.env.OUTPUT_DIR || "output",
    };
  }

  private validateConfig(): void {
    const requiredFields: (keyof AppConfig)[] = ["usptoApiKey"];

    for (const field of requiredFields) {
      if (!this.config[field]) {
        throw new AppError(
          `Missing required configuration: ${field}`,
          500,
          "CONFIG_MISSING"
        );
      }
    }

    if (this.config.port < 1 || this.config.port > 65535) {
      throw new AppError(
        "Invalid port number. Must be between 1 and 65535",
        500,
        "CONFIG_INVALID_PORT"
      );
    }

    const delays: (keyof AppConfig)[] = [
      "interRequestDelayMs",
      "oppositionDelayMs",
      "classRetryBaseDelayMs",
    ];
    for (const field of delays) {
      const value = this.config[field];
      if (typeof value !== "number" || !(value >= 0 && value <= MAX_DELAY_MS)) {
        throw new AppError(
          `${field} must be between 0 and ${MAX_DELAY_MS} milliseconds`,
          500,
          "CONFIG_INVALID_DELAY"
        );
      }
    }

    if (
      !(
        this.config.classRetryAttempts >= 1 &&
        this.config.classRetryAttempts <= 10
      )
    ) {
      throw new AppError(
        "Class retrieval attempts must be between 1 and 10",
        500,
        "CONFIG_INVALID_RETRY"
      );
    }
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  public isDevelopment(): boolean {
    return process.env.NODE_ENV === "development";
  }

  public isProduction(): boolean {
    return process.env.NODE_ENV === "production";
  }

  public isTest(): boolean {
    return process.env.NODE_ENV === "test";
  }
}

export const config = ConfigManager.getInstance();
export default config;
