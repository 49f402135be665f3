import type { AdaptOutcome, AdaptationResult } from '@domain/publishing/application/ContentAdapter';
import type { DispatchAck, PublishSummary } from '@domain/publishing/application/DispatchCoordinator';
import type { ImageOutcome } from '@domain/publishing/application/ImageService';
import type { StatusSummary } from '@domain/publishing/application/StatusAggregator';
import type { ContentItem } from '@domain/publishing/domain/entities/ContentItem';
import type { PublicationAttempt } from '@domain/publishing/domain/entities/PublicationAttempt';

// ============================================================================
// Wire shapes (snake_case, ISO timestamps)
// ============================================================================

export function serializeContentItem(item: ContentItem, publicationsCount?: number) {
  return {
    id: item.id,
    title: item.title,
    content: item.body,
    status: item.status,
    created_at: item.createdAt.toISOString(),
    updated_at: item.updatedAt.toISOString(),
    ...(publicationsCount !== undefined && { publications_count: publicationsCount }),
  };
}

export function serializePublication(attempt: PublicationAttempt) {
  return {
    id: attempt.id,
    post_id: attempt.contentItemId,
    network: attempt.network,
    adapted_content: attempt.adaptedContent,
    status: attempt.status,
    published_at: attempt.publishedAt?.toISOString() ?? null,
    error_message: attempt.errorMessage,
    retry_count: attempt.retryCount,
    metadata: attempt.metadata,
    created_at: attempt.createdAt.toISOString(),
    updated_at: attempt.updatedAt.toISOString(),
  };
}

function serializeAdaptation(result: AdaptationResult) {
  if (!result.ok) {
    return { network: result.network, error: result.error, adapted_text: result.adaptedText };
  }
  return {
    network: result.network,
    adapted_text: result.adaptedText,
    hashtags: result.hashtags,
    image_suggestion: result.imageSuggestion,
    character_count: result.characterCount,
    tone: result.tone,
  };
}

export function serializeAdaptOutcome(outcome: AdaptOutcome) {
  return {
    post_id: outcome.contentItemId,
    preview_only: outcome.previewOnly,
    adaptations: outcome.results.map(serializeAdaptation),
    failed_networks: outcome.results.filter(r => !r.ok).map(r => r.network),
    publications: outcome.attempts.map(serializePublication),
  };
}

export function serializeDispatchAck(ack: DispatchAck) {
  return {
    publication_id: ack.publicationId,
    network: ack.network,
    status: ack.status,
    task_id: ack.taskId,
  };
}

export function serializePublishSummary(summary: PublishSummary) {
  return {
    post_id: summary.contentItemId,
    total_publications: summary.totalPublications,
    results: summary.results.map(serializeDispatchAck),
  };
}

export function serializeStatus(summary: StatusSummary) {
  return {
    post_id: summary.postId,
    post_status: summary.postStatus,
    total_publications: summary.totalPublications,
    by_status: summary.byStatus,
    publications: summary.publications.map(p => ({
      id: p.id,
      network: p.network,
      status: p.status,
      published_at: p.publishedAt?.toISOString() ?? null,
      error_message: p.errorMessage,
      retry_count: p.retryCount,
      metadata: p.metadata,
    })),
  };
}

export function serializeImageOutcome(outcome: ImageOutcome) {
  return {
    post_id: outcome.contentItemId,
    network: outcome.network,
    image_url: outcome.imageUrl,
    revised_prompt: outcome.revisedPrompt,
  };
}
