import type {
  PublicationJob,
  PublicationQueue,
} from '@domain/publishing/application/ports/PublicationQueue';

/**
 * Records enqueued jobs instead of sending them to Redis.
 * Set `failNext` to make the next enqueue reject.
 */
export class InMemoryPublicationQueue implements PublicationQueue {
  readonly jobs: Array<PublicationJob & { taskId: string }> = [];
  failNext: Error | undefined;
  private sequence = 0;

  async enqueue(job: PublicationJob): Promise<string> {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = undefined;
      throw error;
    }
    this.sequence++;
    const taskId = `task-${this.sequence}`;
    this.jobs.push({ ...job, taskId });
    return taskId;
  }

  /** Remove and return everything enqueued so far */
  drain(): PublicationJob[] {
    return this.jobs.splice(0).map(({ taskId: _taskId, ...job }) => job);
  }
}
