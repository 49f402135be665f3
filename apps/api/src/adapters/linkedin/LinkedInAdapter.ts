import { apiConfig } from '@config';
import type { Network } from '@domain/publishing/domain/networks';
import type {
  NetworkPublisher,
  PublishRequest,
  PublishResult,
} from '@domain/publishing/application/ports/NetworkPublisher';
import { getLogger } from '@kernel/logger';

import { bearer, readString, requestJson } from '../http';

const logger = getLogger('LinkedInAdapter');

export interface LinkedInCredentials {
  /** urn:li:person:... or urn:li:organization:... */
  authorUrn: string;
  accessToken: string;
}

/**
 * LinkedIn publisher (UGC Posts API)
 *
 * Text-only shares, or an article share carrying the image URL.
 */
export class LinkedInAdapter implements NetworkPublisher {
  readonly network: Network = 'linkedin';

  constructor(
    private readonly credentials: LinkedInCredentials,
    private readonly timeoutMs: number
  ) {
    if (!credentials.authorUrn.startsWith('urn:li:')) {
      throw new Error('LinkedIn authorUrn must be a urn:li: identifier');
    }
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const shareContent = request.imageUrl
      ? {
        shareCommentary: { text: request.content },
        shareMediaCategory: 'ARTICLE',
        media: [{ status: 'READY', originalUrl: request.imageUrl }],
      }
      : {
        shareCommentary: { text: request.content },
        shareMediaCategory: 'NONE',
      };

    const url = `${apiConfig.baseUrls.linkedin}/${apiConfig.versions.linkedin}/ugcPosts`;
    const response = await requestJson('LinkedIn', url, {
      headers: {
        ...bearer(this.credentials.accessToken),
        'Content-Type': 'application/json',
        'X-Restli-Protocol-Version': '2.0.0',
      },
      body: JSON.stringify({
        author: this.credentials.authorUrn,
        lifecycleState: 'PUBLISHED',
        specificContent: { 'com.linkedin.ugc.ShareContent': shareContent },
        visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' },
      }),
      timeoutMs: this.timeoutMs,
    });

    const postId = readString(response, 'id');
    logger.info('LinkedIn share created', { postId });

    return {
      metadata: { platform: 'linkedin', post_id: postId ?? null, response },
    };
  }
}
