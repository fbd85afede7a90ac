export type ExternalService = 'gemini' | 'smtp';

/**
 * A call to an external provider failed. The message is the provider's
 * own failure reason and is returned to the client as-is.
 */
export class UpstreamServiceError extends Error {
  constructor(
    readonly service: ExternalService,
    message: string,
  ) {
    super(message);
    this.name = 'UpstreamServiceError';
  }
}

/** Credentials or endpoints for an external provider are missing. */
export class ServiceNotConfiguredError extends Error {
  constructor(
    readonly service: ExternalService,
    message: string,
  ) {
    super(message);
    this.name = 'ServiceNotConfiguredError';
  }
}
