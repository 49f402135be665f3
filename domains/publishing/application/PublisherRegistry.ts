import type { Network } from '../domain/networks';
import type { NetworkPublisher } from './ports/NetworkPublisher';

/**
* Network name → publisher table. Adding a network is a registration here,
* not a new branch in the worker.
*/
export class PublisherRegistry {
  private readonly publishers = new Map<Network, NetworkPublisher>();

  constructor(publishers: readonly NetworkPublisher[] = []) {
  for (const publisher of publishers) {
    this.register(publisher);
  }
  }

  register(publisher: NetworkPublisher): void {
  if (this.publishers.has(publisher.network)) {
    throw new Error(`Publisher already registered for ${publisher.network}`);
  }
  this.publishers.set(publisher.network, publisher);
  }

  get(network: Network): NetworkPublisher | undefined {
  return this.publishers.get(network);
  }

  networks(): Network[] {
  return [...this.publishers.keys()];
  }
}
