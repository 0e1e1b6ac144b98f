import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { registerRoutes } from "./routes";
import type { IStorage } from "./storage";
import { log, truncateLogLine } from "./utils";

export interface AppOptions {
  storage: IStorage;
  apiVersion: string;
  logRequests?: boolean;
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) {
      return candidate;
    }
  }
  return 500;
}

export function createApp({ storage, apiVersion, logRequests = true }: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  if (logRequests) {
    app.use((req, res, next) => {
      const start = Date.now();
      const path = req.path;
      let capturedJsonResponse: unknown = undefined;

      const originalResJson = res.json.bind(res);
      res.json = (bodyJson?: unknown) => {
        capturedJsonResponse = bodyJson;
        return originalResJson(bodyJson);
      };

      res.on("finish", () => {
        const duration = Date.now() - start;
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        log(truncateLogLine(logLine));
      });

      next();
    });
  }

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    if (req.method === "OPTIONS") {
      res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type");
      res.status(204).end();
      return;
    }
    next();
  });

  registerRoutes(app, storage, { apiVersion });

  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    if (status >= 500) {
      console.error("Unhandled request error:", err);
    }
    res.status(status).json({ error: status >= 500 ? "Internal Server Error" : message });
  });

  return app;
}
