import rateLimit from "express-rate-limit";
import axios from "axios";
import { Request, Response, NextFunction } from "express";
import logger from "../utils/logger";
import config from "../config/config";
import { ApiResponse, AppError } from "../types/global-interface";

export const rateLimiter = rateLimit({
  windowMs: config.get("rateLimitWindowMs"),
  max: config.get("rateLimitMaxRequests"),
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req: Request, res: Response) => {
    logger.warn("Rate limit exceeded", {
      action: "rate_limit_hit",
      path: req.path,
      ip: req.ip,
    });

    const response: ApiResponse = {
      success: false,
      message: "Too many requests from this IP, please try again later",
      error: "Rate limit exceeded",
    };

    res.status(429).json(response);
  },
});

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity.
  next: NextFunction
): void => {
  logger.error("Request error", error, {
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get("User-Agent"),
  });

  if (error instanceof AppError) {
    const response: ApiResponse = {
      success: false,
      message: error.message,
      error: config.isDevelopment() ? error.stack : error.code || "Application error",
    };

    res.status(error.statusCode).json(response);
    return;
  }

  if (axios.isAxiosError(error)) {
    let message = "Upstream service error";
    let statusCode = 502;

    if (error.response) {
      statusCode = error.response.status === 429 ? 429 : 502;
      message =
        error.response.status === 429
          ? "Upstream rate limit exceeded"
          : "Upstream service error";
    } else if (error.request) {
      message = "Upstream service unavailable";
      statusCode = 503;
    }

    const response: ApiResponse = {
      success: false,
      message,
      error: config.isDevelopment() ? error.message : "External API error",
    };

    res.status(statusCode).json(response);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError) {
    const response: ApiResponse = {
      success: false,
      message: "Malformed request body",
      error: "Validation error",
    };

    res.status(400).json(response);
    return;
  }

  const response: ApiResponse = {
    success: false,
    message: config.isDevelopment() ? error.message : "Internal server error",
    error: config.isDevelopment() ? error.stack : "Internal server error",
  };

  res.status(500).json(response);
};

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();

  res.on("finish", () => {
    logger.debug("Request completed", {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
    });
  });

  next();
};

export const corsOptions = {
  origin: (
    origin: string | undefined,
    callback: (error: Error | null, allow?: boolean) => void
  ) => {
    // Requests without an origin (curl, scripts) are allowed.
    if (!origin) return callback(null, true);

    if (config.get("corsOrigins").includes(origin)) {
      callback(null, true);
    } else {
      logger.warn("CORS origin not allowed", { action: "cors_denied", url: origin });
      callback(new AppError("Not allowed by CORS", 403, "CORS_DENIED"));
    }
  },
  credentials: true,
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type"],
  exposedHeaders: ["Content-Disposition"],
};

export const securityHeaders = (req: Request, res: Response, next: NextFunction): void => {
  res.removeHeader("X-Powered-By");

  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");

  if (req.path.startsWith("/api/")) {
    res.setHeader("Content-Security-Policy", "default-src 'none'");
  }

  next();
};

export const healthCheckBypass = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === "/health" || req.path === "/api/health") {
    return next();
  }

  requestLogger(req, res, next);
};

export const gracefulShutdown = (req: Request, res: Response, next: NextFunction): void => {
  if (process.env.SHUTTING_DOWN === "true") {
    const response: ApiResponse = {
      success: false,
      message: "Server is shutting down, please try again later",
      error: "Service unavailable",
    };

    res.status(503).json(response);
    return;
  }

  next();
};
