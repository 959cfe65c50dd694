import type { ErrorKind } from "@studyforge/shared-types";
import type { GatewayServices } from "../services.js";

/** Options every route plugin is registered with */
export interface RouteOptions {
  services: GatewayServices;
}

export interface ApiError {
  code: string;
  message: string;
}

export function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

export function fail(code: string, message: string, requestId: string, data: unknown = null) {
  return { data, requestId, errors: [{ code, message }] satisfies ApiError[] };
}

export const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
  ValidationFailed: 422,
  ModelNotFound: 424,
  InvalidResponse: 502,
  UpstreamError: 502,
  NetworkUnavailable: 503,
  Timeout: 504,
};
