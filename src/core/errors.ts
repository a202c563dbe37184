export type GatewayErrorKind =
  | 'validation'
  | 'unsupported_client_type'
  | 'adapter_not_ready'
  | 'processing_failure'
  | 'config';

/** Base class for every error the gateway raises on purpose. */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed inbound payload: a missing field or an unrecognized enumeration value. */
export class ValidationError extends GatewayError {
  readonly kind = 'validation' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class UnsupportedClientTypeError extends GatewayError {
  readonly kind = 'unsupported_client_type' as const;
  readonly clientType: string;

  constructor(clientType: string) {
    super(`Unsupported client type: '${clientType}'`);
    this.clientType = clientType;
  }
}

export class AdapterNotReadyError extends GatewayError {
  readonly kind = 'adapter_not_ready' as const;
  readonly adapter: string;

  constructor(adapter: string) {
    super(`${adapter} adapter is not ready`);
    this.adapter = adapter;
  }
}

/** The response generator or a built-in handler failed. */
export class ProcessingFailureError extends GatewayError {
  readonly kind = 'processing_failure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends GatewayError {
  readonly kind = 'config' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid gateway configuration: ${issues.join(' | ')}`);
    this.issues = issues;
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
