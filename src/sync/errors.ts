import type { Environment } from "@/sync/types";

export type AuthFailureReason = "invalid_credentials" | "network" | "unexpected_response";

/** The token endpoint refused us or could not be reached. Fatal for a run. */
export class AuthenticationError extends Error {
  readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string) {
    super(message);
    this.name = "AuthenticationError";
    this.reason = reason;
  }
}

export class FleetApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly path: string;

  constructor(status: number, method: string, path: string, statusText: string) {
    super(`Fleet API error: ${method} ${path} returned ${status} ${statusText}`);
    this.name = "FleetApiError";
    this.status = status;
    this.method = method;
    this.path = path;
  }
}

/** Listing an environment's resources failed; matching cannot proceed. */
export class ResourceListError extends Error {
  readonly environment: Environment;

  constructor(environment: Environment, cause: string) {
    super(`Could not list ${environment} resources: ${cause}`);
    this.name = "ResourceListError";
    this.environment = environment;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
