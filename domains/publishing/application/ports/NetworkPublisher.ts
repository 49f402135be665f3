import type { Network } from '../../domain/networks';

export interface PublishRequest {
  content: string;
  imageUrl?: string | undefined;
}

export interface PublishResult {
  /** Network response data, e.g. the remote post id */
  metadata: Record<string, unknown>;
}

/**
* Per-network publish capability
*/
export interface NetworkPublisher {
  readonly network: Network;
  /**
  * @throws PublishFailure classified as transient or permanent
  */
  publish(request: PublishRequest): Promise<PublishResult>;
}

export type PublishFailureKind = 'transient' | 'permanent';

/**
* Publish error carrying its retry classification.
* Validation problems (missing image, rejected payload) are permanent;
* timeouts, connection errors, 429 and 5xx responses are transient.
*/
export class PublishFailure extends Error {
  constructor(
  message: string,
  public readonly kind: PublishFailureKind,
  public readonly status?: number,
  cause?: Error
  ) {
  super(message, cause ? { cause } : undefined);
  this.name = 'PublishFailure';
  }

  static transient(message: string, status?: number, cause?: Error): PublishFailure {
  return new PublishFailure(message, 'transient', status, cause);
  }

  static permanent(message: string, status?: number, cause?: Error): PublishFailure {
  return new PublishFailure(message, 'permanent', status, cause);
  }

  get retryable(): boolean {
  return this.kind === 'transient';
  }
}

/**
* Classify anything a publisher threw. Unclassified errors are treated as
* transient: a bug or outage should not burn the attempt on the first try.
*/
export function toPublishFailure(error: unknown): PublishFailure {
  if (error instanceof PublishFailure) {
  return error;
  }
  if (error instanceof Error) {
  return PublishFailure.transient(error.message, undefined, error);
  }
  return PublishFailure.transient(String(error));
}
