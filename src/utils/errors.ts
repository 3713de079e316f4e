export type TransientKind = "Timeout" | "RateLimited";
export type VenueRejectionKind = "Rejected" | "InsufficientFunds" | "NotFound" | "AlreadyClosed";
export type GatewayErrorKind = TransientKind | VenueRejectionKind;

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
}

export class TransientGatewayError extends GatewayError {
  constructor(
    readonly kind: TransientKind,
    message: string
  ) {
    super(message);
    this.name = "TransientGatewayError";
  }
}

export class RejectedByVenueError extends GatewayError {
  constructor(
    readonly kind: VenueRejectionKind,
    message: string
  ) {
    super(message);
    this.name = "RejectedByVenueError";
  }
}

export class ConfigurationError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export function isTransient(error: unknown): error is TransientGatewayError {
  return error instanceof TransientGatewayError;
}

export function errorKind(error: unknown): string {
  if (error instanceof GatewayError) return error.kind;
  if (error instanceof Error) return error.name;
  return "Unknown";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
