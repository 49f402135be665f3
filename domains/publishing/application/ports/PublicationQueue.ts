import type { Network } from '../../domain/networks';

/**
* One unit of work: publish a single attempt to its network.
*/
export interface PublicationJob {
  attemptId: string;
  network: Network;
  content: string;
  imageUrl?: string | undefined;
}

/**
* Work queue port. Delivery is at-least-once; the worker treats duplicate
* delivery of a terminal attempt as a no-op.
*/
export interface PublicationQueue {
  /**
  * Enqueue one job
  * @returns Opaque handle identifying the queued job
  */
  enqueue(job: PublicationJob): Promise<string>;
}
