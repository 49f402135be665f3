import { apiConfig } from '@config';
import type { Network } from '@domain/publishing/domain/networks';
import {
  PublishFailure,
  type NetworkPublisher,
  type PublishRequest,
  type PublishResult,
} from '@domain/publishing/application/ports/NetworkPublisher';
import { getLogger } from '@kernel/logger';

import { bearer, readString, requestJson } from '../http';

const logger = getLogger('InstagramAdapter');

export interface InstagramCredentials {
  /** Instagram business account id */
  accountId: string;
  accessToken: string;
}

/**
 * Instagram publisher (Graph API content publishing)
 *
 * Two calls: create a media container for the image, then publish the
 * container. Instagram has no text-only posts.
 */
export class InstagramAdapter implements NetworkPublisher {
  readonly network: Network = 'instagram';
  private readonly baseUrl: string;

  constructor(
    private readonly credentials: InstagramCredentials,
    private readonly timeoutMs: number
  ) {
    this.baseUrl = `${apiConfig.baseUrls.instagram}/${apiConfig.versions.instagram}`;
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    if (!request.imageUrl) {
      throw PublishFailure.permanent('Instagram requires an image');
    }

    const { accountId } = this.credentials;

    const container = await this.post(`${accountId}/media`, {
      image_url: request.imageUrl,
      caption: request.content,
    });
    const creationId = readString(container, 'id');
    if (!creationId) {
      throw PublishFailure.permanent('Invalid response from Instagram: missing media container id');
    }

    const response = await this.post(`${accountId}/media_publish`, { creation_id: creationId });
    const postId = readString(response, 'id');
    logger.info('Instagram media published', { accountId, creationId, postId });

    return {
      metadata: {
        platform: 'instagram',
        creation_id: creationId,
        post_id: postId ?? null,
        response,
      },
    };
  }

  private post(path: string, params: Record<string, string>) {
    return requestJson('Instagram', `${this.baseUrl}/${path}`, {
      headers: {
        ...bearer(this.credentials.accessToken),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams(params),
      timeoutMs: this.timeoutMs,
    });
  }
}
