import type { Server } from "node:http";
import type { Express } from "express";
import { createLogger } from "../shared/logger.js";

const DEFAULT_PORT = 8000;

const log = createLogger("http");

export interface HttpServerOptions {
  app: Express;
  /** 0 binds an ephemeral port; read it back from `port` after start(). */
  port?: number;
  host?: string;
}

export class HttpServer {
  private readonly app: Express;
  private readonly requestedPort: number;
  private readonly host?: string;
  private server: Server | null = null;

  constructor(options: HttpServerOptions) {
    this.app = options.app;
    this.requestedPort = options.port ?? DEFAULT_PORT;
    this.host = options.host;
  }

  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.requestedPort;
  }

  async start(): Promise<void> {
    if (this.server) return;

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.requestedPort, this.host ?? "0.0.0.0");

      const onError = (err: NodeJS.ErrnoException): void => {
        log.error("HTTP server error", { code: err.code, error: err.message });
        this.server = null;
        reject(err);
      };

      server.once("error", onError);
      server.once("listening", () => {
        server.off("error", onError);
        this.server = server;
        log.info("HTTP server listening", { port: this.port });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });
    this.server = null;
    log.info("HTTP server stopped");
  }
}
