/**
 * Transport-free routing for the case API. Takes a method, a path and the
 * raw body; returns a status and a JSON-ready body. The HTTP server is a
 * thin shell around `handle`.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { CaseService } from "../connectors/cases/index.js";
import { CaseCreateSchema, CaseUpdateSchema } from "../connectors/cases/index.js";
import type { ErrorDetail, Logger, PersistedState, Result } from "../connectors/core/index.js";
import {
  ERROR_FORMAT_VERSION,
  err,
  errorMessage,
  ok,
  validationError,
} from "../connectors/core/index.js";

// ─── Types ───

export interface RouteRequest {
  method: string;
  path: string;
  body: string;
}

export interface RouteResponse {
  status: number;
  body?: unknown;
}

export interface ErrorBody {
  title: string;
  detail: string;
  version: string;
  error_messages: string[];
}

type RouteHandler = (params: Record<string, string>, body: string) => Promise<RouteResponse>;

interface Route {
  method: string;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
}

export interface CaseRouterOptions {
  service: CaseService;
  logger: Logger;
  /** Summary of the most recent synchronization pass. */
  syncState: () => PersistedState;
}

// ─── Router ───

export class CaseRouter {
  private readonly service: CaseService;
  private readonly logger: Logger;
  private readonly syncState: () => PersistedState;
  private readonly routes: Route[] = [];

  constructor(opts: CaseRouterOptions) {
    this.service = opts.service;
    this.logger = opts.logger;
    this.syncState = opts.syncState;

    this.addRoute("GET", "/health", this.handleHealth.bind(this));
    this.addRoute("POST", "/case", this.handleCreate.bind(this));
    this.addRoute("GET", "/case/:id", this.handleGet.bind(this));
    this.addRoute("PUT", "/case/:id", this.handleUpdate.bind(this));
    this.addRoute("DELETE", "/case/:id", this.handleDelete.bind(this));
  }

  private addRoute(method: string, pattern: string, handler: RouteHandler): void {
    const paramNames: string[] = [];
    const regexPattern = pattern.replace(/:([a-zA-Z_][a-zA-Z0-9_]*)/g, (_, name: string) => {
      paramNames.push(name);
      return "([^/]+)";
    });

    this.routes.push({
      method,
      pattern: new RegExp(`^${regexPattern}/?$`),
      paramNames,
      handler,
    });
  }

  async handle(req: RouteRequest): Promise<RouteResponse> {
    for (const route of this.routes) {
      if (route.method !== req.method) continue;
      const match = req.path.match(route.pattern);
      if (!match) continue;

      const params: Record<string, string> = {};
      route.paramNames.forEach((name, index) => {
        params[name] = decodeParam(match[index + 1] ?? "");
      });

      try {
        return await route.handler(params, req.body);
      } catch (error) {
        this.logger.error(`${req.method} ${req.path} failed: ${errorMessage(error)}`);
        return internalError();
      }
    }

    return {
      status: 404,
      body: errorBody("Not Found", `No route for ${req.method} ${req.path}`, []),
    };
  }

  // ─── Handlers ───

  private async handleHealth(): Promise<RouteResponse> {
    const state = this.syncState();
    return {
      status: 200,
      body: {
        status: "ok",
        lastSync: state.lastSyncAt
          ? {
              at: state.lastSyncAt,
              ok: state.lastResult?.errors.length === 0,
              inserted: state.lastResult?.inserted ?? 0,
              updated: state.lastResult?.updated ?? 0,
              deleted: state.lastResult?.deleted ?? 0,
            }
          : null,
      },
    };
  }

  private async handleCreate(_params: Record<string, string>, body: string): Promise<RouteResponse> {
    const input = parseBody(body, CaseCreateSchema);
    if (!input.ok) return fromError(input.error);

    const created = await this.service.create(input.value);
    return created.ok ? { status: 201, body: created.value } : fromError(created.error);
  }

  private async handleGet(params: Record<string, string>): Promise<RouteResponse> {
    const id = parseId(params.id);
    if (!id.ok) return fromError(id.error);

    const found = this.service.get(id.value);
    if (!found.ok) return fromError(found.error);
    if (!found.value) {
      return { status: 404, body: errorBody("Not Found", `Case ${id.value} is not mirrored`, []) };
    }

    return {
      status: 200,
      body: {
        id: found.value.id,
        version: found.value.version,
        payload: parsePayload(found.value.payload),
      },
    };
  }

  private async handleUpdate(params: Record<string, string>, body: string): Promise<RouteResponse> {
    const id = parseId(params.id);
    if (!id.ok) return fromError(id.error);
    const input = parseBody(body, CaseUpdateSchema);
    if (!input.ok) return fromError(input.error);

    const updated = await this.service.update(id.value, input.value);
    return updated.ok ? { status: 201, body: updated.value } : fromError(updated.error);
  }

  private async handleDelete(params: Record<string, string>): Promise<RouteResponse> {
    const id = parseId(params.id);
    if (!id.ok) return fromError(id.error);

    const deleted = await this.service.delete(id.value);
    return deleted.ok ? { status: 204 } : fromError(deleted.error);
  }
}

// ─── Helpers ───

function errorBody(title: string, detail: string, messages: string[]): ErrorBody {
  return { title, detail, version: ERROR_FORMAT_VERSION, error_messages: messages };
}

export function fromError(error: ErrorDetail): RouteResponse {
  return {
    status: error.statusCode,
    body: errorBody(
      error.title,
      error.detail,
      error.errorMessages.map((m) => m.message),
    ),
  };
}

export function internalError(): RouteResponse {
  return {
    status: 500,
    body: errorBody("Internal Server Error", "An unexpected error occurred", []),
  };
}

/** Malformed escapes stay as sent, for the parameter's own validation to reject. */
function decodeParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (e) {
    if (e instanceof URIError) return raw;
    throw e;
  }
}

function parseId(raw: string | undefined): Result<number, ErrorDetail> {
  const id = Number(raw);
  if (!raw || !/^\d+$/.test(raw) || !Number.isSafeInteger(id)) {
    return err(validationError("Invalid case id", [`"${raw ?? ""}" is not a case id`], 400));
  }
  return ok(id);
}

function parseBody<T>(body: string, schema: ZodType<T, ZodTypeDef, unknown>): Result<T, ErrorDetail> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    return err(validationError("Malformed JSON body", [errorMessage(e)], 400));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return err(
      validationError(
        "Request body failed validation",
        parsed.error.issues.map((i) =>
          i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
        ),
      ),
    );
  }
  return ok(parsed.data);
}

function parsePayload(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    // Opaque payload; non-JSON text goes back verbatim
    return payload;
  }
}
