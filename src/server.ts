// HSIE Evidence Pipeline - Read-only HTTP surface
//
// Serves committed Evidence to reviewers. There are no write routes: Evidence
// enters the store only through the pipeline stages.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { isPipelineError, NotFoundError } from "./errors.js";
import type { EvidenceReader } from "./evidence-store.js";
import { createLogger, type PipelineLogger } from "./logger.js";

export interface CreateServerOptions {
  store: EvidenceReader;
  logger?: PipelineLogger;
}

export interface EvidenceServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createEvidenceServer(options: CreateServerOptions): EvidenceServer {
  const { store } = options;
  const logger = options.logger ?? createLogger("Server");

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/evidence/:id",
    route(async (req, res) => {
      res.json(await store.get(req.params.id));
    }),
  );

  app.get(
    "/evidence/:id/lineage",
    route(async (req, res) => {
      res.json(await store.lineage(req.params.id));
    }),
  );

  app.get(
    "/evidence/:id/children",
    route(async (req, res) => {
      // 404 for unknown ids rather than an empty list
      await store.get(req.params.id);
      res.json(await store.children(req.params.id));
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.kind, message: err.message });
      return;
    }
    if (isPipelineError(err)) {
      logger.error(err.toReport());
      res.status(500).json({ error: err.kind, message: err.message });
      return;
    }
    logger.error(`Unhandled error: ${err instanceof Error ? err.message : String(err)}`);
    res.status(500).json({ error: "InternalError", message: "Internal server error" });
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) {
            reject(err);
          } else {
            logger.info("Server closed");
            resolve();
          }
        });
      });
    },
  };
}
