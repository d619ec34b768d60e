/**
 * HTTP server for the case API, on Node's built-in http module.
 */

import * as http from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../connectors/core/index.js";
import { ERROR_FORMAT_VERSION, errorMessage } from "../connectors/core/index.js";
import type { CaseRouter, RouteResponse } from "./router.js";
import { internalError } from "./router.js";

/** Request bodies above this size are refused with 413. */
const MAX_BODY_BYTES = 1_048_576;

export interface ServerConfig {
  port: number;
  host?: string;
}

export class CaseApiServer {
  private readonly router: CaseRouter;
  private readonly logger: Logger;
  private server: http.Server | null = null;

  constructor(router: CaseRouter, logger: Logger) {
    this.router = router;
    this.logger = logger;
  }

  /** Bound address once started; port 0 resolves to the ephemeral port. */
  get address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr === "object" ? addr : null;
  }

  private async handleRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    let body: string;
    try {
      body = await readBody(req);
    } catch (error) {
      this.logger.warn(`Rejected request body: ${errorMessage(error)}`);
      this.send(res, {
        status: 413,
        body: {
          title: "Payload Too Large",
          detail: errorMessage(error),
          version: ERROR_FORMAT_VERSION,
          error_messages: [],
        },
      });
      return;
    }

    const response = await this.router.handle({ method, path: url.pathname, body });
    this.logger.debug(`${method} ${url.pathname} -> ${response.status}`);
    this.send(res, response);
  }

  private send(res: http.ServerResponse, response: RouteResponse): void {
    if (response.body === undefined) {
      res.writeHead(response.status);
      res.end();
      return;
    }
    res.writeHead(response.status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(response.body));
  }

  async start(config: ServerConfig): Promise<void> {
    const { port, host = "127.0.0.1" } = config;

    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error(`Request error: ${errorMessage(error)}`);
          if (!res.headersSent) this.send(res, internalError());
        });
      });
      this.server = server;

      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        const bound = this.address;
        this.logger.info(`Server started at http://${host}:${bound?.port ?? port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      server.close((error) => {
        this.server = null;
        if (error) {
          reject(error);
          return;
        }
        this.logger.info("Server stopped");
        resolve();
      });
    });
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      // Keep draining so the response can still be written
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > MAX_BODY_BYTES) {
        reject(new Error(`Body exceeds ${MAX_BODY_BYTES} bytes`));
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf-8"));
    });
    req.on("error", reject);
  });
}
