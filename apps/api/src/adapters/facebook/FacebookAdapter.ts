import { apiConfig } from '@config';
import type { Network } from '@domain/publishing/domain/networks';
import type {
  NetworkPublisher,
  PublishRequest,
  PublishResult,
} from '@domain/publishing/application/ports/NetworkPublisher';
import { getLogger } from '@kernel/logger';

import { bearer, readString, requestJson } from '../http';

const logger = getLogger('FacebookAdapter');

export interface FacebookCredentials {
  pageId: string;
  accessToken: string;
}

/**
 * Facebook Page publisher
 *
 * Posts with an image go to the page's photos edge with the text as caption;
 * text-only posts go to the feed edge. Form-encoded bodies, token in the
 * Authorization header so it never appears in a URL.
 */
export class FacebookAdapter implements NetworkPublisher {
  readonly network: Network = 'facebook';
  private readonly baseUrl: string;

  constructor(
    private readonly credentials: FacebookCredentials,
    private readonly timeoutMs: number
  ) {
    if (!/^\d+$/.test(credentials.pageId)) {
      throw new Error('Facebook pageId must be numeric');
    }
    this.baseUrl = `${apiConfig.baseUrls.facebook}/${apiConfig.versions.facebook}`;
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const { pageId, accessToken } = this.credentials;

    const edge = request.imageUrl ? 'photos' : 'feed';
    const body = request.imageUrl
      ? new URLSearchParams({ url: request.imageUrl, caption: request.content })
      : new URLSearchParams({ message: request.content });

    const response = await requestJson('Facebook', `${this.baseUrl}/${pageId}/${edge}`, {
      headers: {
        ...bearer(accessToken),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body,
      timeoutMs: this.timeoutMs,
    });

    // photos returns both ids; post_id is the feed story
    const postId = readString(response, 'post_id') ?? readString(response, 'id');
    logger.info('Facebook post created', { pageId, edge, postId });

    return {
      metadata: { platform: 'facebook', post_id: postId ?? null, response },
    };
  }
}
