import type { Network } from '@domain/publishing/domain/networks';
import type {
  NetworkPublisher,
  PublishRequest,
  PublishResult,
} from '@domain/publishing/application/ports/NetworkPublisher';

type Step = PublishResult | Error;

/**
 * Publisher that replays a script of results and errors, one per call.
 * When the script runs out it keeps returning the fallback.
 */
export class StubPublisher implements NetworkPublisher {
  readonly requests: PublishRequest[] = [];
  private readonly script: Step[];

  constructor(
    readonly network: Network,
    script: Step[] = [],
    private readonly fallback: Step = { metadata: { platform: network, post_id: `${network}-post` } }
  ) {
    this.script = [...script];
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    this.requests.push(request);
    const step = this.script.shift() ?? this.fallback;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}
