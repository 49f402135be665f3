import { apiConfig } from '@config';
import type { Network } from '@domain/publishing/domain/networks';
import {
  PublishFailure,
  type NetworkPublisher,
  type PublishRequest,
  type PublishResult,
} from '@domain/publishing/application/ports/NetworkPublisher';
import { getLogger } from '@kernel/logger';

import { bearer, isJsonObject, isVideoUrl, readString, requestJson } from '../http';

const logger = getLogger('TikTokAdapter');

/** TikTok caps the post title */
export const TIKTOK_TITLE_MAX_LENGTH = 150;

export interface TikTokCredentials {
  accessToken: string;
}

/**
 * TikTok publisher (Content Posting API, direct post)
 *
 * TikTok pulls the video from the given URL; publishing completes on
 * TikTok's side after this call returns a publish_id.
 */
export class TikTokAdapter implements NetworkPublisher {
  readonly network: Network = 'tiktok';

  constructor(
    private readonly credentials: TikTokCredentials,
    private readonly timeoutMs: number
  ) {}

  async publish(request: PublishRequest): Promise<PublishResult> {
    if (!request.imageUrl || !isVideoUrl(request.imageUrl)) {
      throw PublishFailure.permanent('TikTok requires a video');
    }

    const url = `${apiConfig.baseUrls.tiktok}/${apiConfig.versions.tiktok}/post/publish/video/init/`;
    const response = await requestJson('TikTok', url, {
      headers: {
        ...bearer(this.credentials.accessToken),
        'Content-Type': 'application/json; charset=UTF-8',
      },
      body: JSON.stringify({
        post_info: {
          title: request.content.slice(0, TIKTOK_TITLE_MAX_LENGTH),
          privacy_level: 'PUBLIC_TO_EVERYONE',
          disable_comment: false,
        },
        source_info: {
          source: 'PULL_FROM_URL',
          video_url: request.imageUrl,
        },
      }),
      timeoutMs: this.timeoutMs,
    });

    // 200 responses can still carry an error code
    const error = response['error'];
    if (isJsonObject(error)) {
      const code = readString(error, 'code');
      if (code && code !== 'ok') {
        const message = readString(error, 'message') ?? code;
        throw PublishFailure.permanent(`TikTok API error: ${message}`);
      }
    }

    const data = response['data'];
    const publishId = isJsonObject(data) ? readString(data, 'publish_id') : undefined;
    logger.info('TikTok video submitted', { publishId });

    return {
      metadata: { platform: 'tiktok', publish_id: publishId ?? null, response },
    };
  }
}
