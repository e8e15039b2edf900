import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { createServer, Server as HttpServer } from "http";
import { v4 as uuidv4 } from "uuid";
import logger from "./utils/logger";
import {
  corsOptions,
  securityHeaders,
  healthCheckBypass,
  gracefulShutdown,
} from "./middleware";
import config from "./config/config";
import { createRouter } from "./routes";
import { OppositionController } from "./controllers/opposition-controller";
import { OppositionScraper } from "./services/opposition-scraper";

class Server {
  private app: express.Application;
  private server: HttpServer | null = null;
  private scraper: OppositionScraper;
  private isShuttingDown = false;

  constructor() {
    this.app = express();
    this.scraper = new OppositionScraper();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(
      helmet({
        contentSecurityPolicy: false,
      })
    );
    this.app.use(securityHeaders);

    this.app.use(cors(corsOptions));

    this.app.use(express.json({ limit: "1mb" }));
    this.app.use(express.urlencoded({ extended: true, limit: "1mb" }));

    this.app.use(healthCheckBypass);

    if (config.isDevelopment()) {
      this.app.use(morgan("dev"));
    }

    this.app.use(gracefulShutdown);

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      res.setHeader("X-Request-ID", uuidv4());
      next();
    });
  }

  private setupRoutes(): void {
    this.app.use("/api", createRouter(new OppositionController(this.scraper)));

    this.app.get("/", (req, res) => {
      res.json({
        message: "TTAB Opposition Scraper API",
        version: process.env.npm_package_version || "1.0.0",
        status: "running",
        endpoints: {
          health: "/api/health",
          oppositions: "/api/oppositions/:number",
          batches: "/api/batches",
        },
      });
    });

    this.app.use("*", (req, res) => {
      res.status(404).json({
        success: false,
        message: "Endpoint not found",
        error: "Not found",
        path: req.originalUrl,
      });
    });
  }

  private setupErrorHandling(): void {
    // Errors that escape the API router's own handler
    this.app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
      logger.error("Unhandled application error", error, {
        requestId: res.getHeader("X-Request-ID")?.toString(),
        path: req.path,
        method: req.method,
      });

      if (res.headersSent) {
        next(error);
        return;
      }

      res.status(500).json({
        success: false,
        message: config.isDevelopment() ? error.message : "Internal server error",
        error: config.isDevelopment() ? error.stack : "Internal server error",
      });
    });
  }

  public async start(): Promise<void> {
    const port = config.get("port");
    const server = createServer(this.app);
    this.server = server;

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.syscall !== "listen") {
        throw error;
      }

      switch (error.code) {
        case "EACCES":
          logger.error(`Port ${port} requires elevated privileges`);
          process.exit(1);
          break;
        case "EADDRINUSE":
          logger.error(`Port ${port} is already in use`);
          process.exit(1);
          break;
        default:
          throw error;
      }
    });

    server.on("listening", () => {
      logger.info("Server started successfully", {
        port,
        environment: process.env.NODE_ENV || "development",
        pid: process.pid,
      });
    });

    server.listen(port);
    this.setupGracefulShutdown();
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string): Promise<void> => {
      if (this.isShuttingDown) {
        logger.warn("Shutdown already in progress, forcing exit");
        process.exit(1);
      }

      this.isShuttingDown = true;
      process.env.SHUTTING_DOWN = "true";

      logger.info(`Received ${signal}, starting graceful shutdown`);

      const shutdownTimeout = setTimeout(() => {
        logger.error("Shutdown timeout reached, forcing exit");
        process.exit(1);
      }, 30000);

      try {
        await this.stop();
        await this.scraper.close();

        clearTimeout(shutdownTimeout);
        logger.info("Graceful shutdown completed");
        process.exit(0);
      } catch (error) {
        logger.error("Error during shutdown", error instanceof Error ? error : undefined);
        clearTimeout(shutdownTimeout);
        process.exit(1);
      }
    };

    const onSignal = (signal: string) => () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", error instanceof Error ? error : undefined);
        process.exit(1);
      });
    };

    process.on("SIGINT", onSignal("SIGINT"));
    process.on("SIGTERM", onSignal("SIGTERM"));
    process.on("SIGQUIT", onSignal("SIGQUIT"));

    process.on("uncaughtException", (error: Error) => {
      logger.error("Uncaught exception", error);
      onSignal("uncaughtException")();
    });

    process.on("unhandledRejection", (reason: unknown, promise: Promise<unknown>) => {
      logger.error("Unhandled promise rejection", new Error(String(reason)), {
        promise: String(promise),
      });
      onSignal("unhandledRejection")();
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve) => {
      server.close(() => {
        logger.info("HTTP server closed");
        resolve();
      });
    });
    this.server = null;
  }
}

const server = new Server();

if (require.main === module) {
  server.start().catch((error: unknown) => {
    logger.error("Failed to start application", error instanceof Error ? error : undefined);
    process.exit(1);
  });
}

export default server;
