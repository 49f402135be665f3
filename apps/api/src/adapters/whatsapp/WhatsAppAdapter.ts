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

const logger = getLogger('WhatsAppAdapter');

export interface WhatsAppCredentials {
  phoneNumberId: string;
  /** Destination number or group in international format */
  recipient: string;
  accessToken: string;
}

/**
 * WhatsApp publisher (Cloud API messages)
 *
 * Sends the adapted text as the caption of an image or video message.
 */
export class WhatsAppAdapter implements NetworkPublisher {
  readonly network: Network = 'whatsapp';
  private readonly baseUrl: string;

  constructor(
    private readonly credentials: WhatsAppCredentials,
    private readonly timeoutMs: number
  ) {
    this.baseUrl = `${apiConfig.baseUrls.whatsapp}/${apiConfig.versions.whatsapp}`;
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    if (!request.imageUrl) {
      throw PublishFailure.permanent('WhatsApp requires an image or video');
    }

    const type = isVideoUrl(request.imageUrl) ? 'video' : 'image';
    const { phoneNumberId, recipient, accessToken } = this.credentials;

    const response = await requestJson('WhatsApp', `${this.baseUrl}/${phoneNumberId}/messages`, {
      headers: {
        ...bearer(accessToken),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to: recipient,
        type,
        [type]: { link: request.imageUrl, caption: request.content },
      }),
      timeoutMs: this.timeoutMs,
    });

    const messages = response['messages'];
    const first: unknown = Array.isArray(messages) ? messages[0] : undefined;
    const messageId = isJsonObject(first) ? readString(first, 'id') : undefined;
    logger.info('WhatsApp message sent', { phoneNumberId, type, messageId });

    return {
      metadata: { platform: 'whatsapp', message_id: messageId ?? null, response },
    };
  }
}
