/**
* Supported social networks.
*
* The set is closed: every publication attempt targets exactly one of these,
* and adding a network means adding it here plus registering a publisher.
*/

export const NETWORKS = ['facebook', 'instagram', 'linkedin', 'tiktok', 'whatsapp'] as const;

export type Network = typeof NETWORKS[number];

/** Networks adapted when a client does not name any */
export const DEFAULT_ADAPT_NETWORKS: readonly Network[] = ['facebook', 'instagram', 'linkedin', 'whatsapp'];

/** Maximum post text length accepted by each network */
export const NETWORK_CHARACTER_LIMITS: Readonly<Record<Network, number>> = {
  facebook: 63206,
  instagram: 2200,
  linkedin: 3000,
  tiktok: 2200,
  whatsapp: 700,
};

export function isNetwork(value: string): value is Network {
  return NETWORKS.some(network => network === value);
}

/**
* Cut text to the network's limit, on a word boundary when one is close
*/
export function truncateForNetwork(text: string, network: Network): string {
  const limit = NETWORK_CHARACTER_LIMITS[network];
  if (text.length <= limit) {
    return text;
  }
  const hardCut = text.slice(0, limit - 1);
  const lastSpace = hardCut.lastIndexOf(' ');
  const cut = lastSpace > limit * 0.8 ? hardCut.slice(0, lastSpace) : hardCut;
  return `${cut.trimEnd()}…`;
}
