/**
 * Error taxonomy. Every error carries the HTTP status the global error
 * handler answers with when it escapes a route.
 */

export class ExporterError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Bad flag or config file value — fatal at startup */
export class UsageError extends ExporterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 400, options);
  }
}

/** DNS lookup failed or returned no addresses */
export class ResolutionError extends ExporterError {
  readonly host: string;

  constructor(host: string, message: string, options?: ErrorOptions) {
    super(message, 400, options);
    this.host = host;
  }
}

/** The probe engine rejected an address */
export class RegistrationError extends ExporterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options);
  }
}

/** The probing transport cannot be used at all — fatal at startup */
export class ProbeTransportError extends ExporterError {}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
