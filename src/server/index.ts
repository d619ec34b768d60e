export type {
  CaseRouterOptions,
  ErrorBody,
  RouteRequest,
  RouteResponse,
} from "./router.js";
export { CaseRouter, fromError, internalError } from "./router.js";
export type { ServerConfig } from "./server.js";
export { CaseApiServer } from "./server.js";
