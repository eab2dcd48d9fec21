import { createLogger } from './logger';
import { isAbortError } from './errors';

const logger = createLogger('task-group');

export type Pipeline = (signal: AbortSignal) => Promise<void>;

export interface SpawnOptions {
  /** Orderly completion of this pipeline ends the whole group. */
  endsGroup?: boolean;
}

/**
 * Supervised group of concurrently running pipelines.
 *
 * The group ends on the first pipeline failure, on the completion of a
 * pipeline spawned with `endsGroup`, or when the parent signal aborts. Ending
 * aborts the shared signal so every other pipeline unwinds. `join` waits for
 * all of them to settle, then rethrows the failure that ended the group.
 */
export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly tasks: Promise<void>[] = [];
  private failure: { error: unknown } | null = null;
  private readonly detachParent: () => void;

  constructor(parent?: AbortSignal) {
    const onParentAbort = () => this.end({ error: parent?.reason });
    if (parent?.aborted) {
      this.detachParent = () => {};
      onParentAbort();
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
      this.detachParent = () => parent?.removeEventListener('abort', onParentAbort);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get ended(): boolean {
    return this.controller.signal.aborted;
  }

  spawn(name: string, pipeline: Pipeline, options: SpawnOptions = {}): void {
    const task = Promise.resolve()
      .then(() => pipeline(this.controller.signal))
      .then(
        () => {
          if (options.endsGroup) {
            logger.debug(`${name} completed, ending group`);
            this.end(null);
          }
        },
        (error: unknown) => {
          if (!this.ended && !isAbortError(error)) {
            logger.warn(`${name} failed`, error);
          }
          this.end({ error });
        }
      );
    this.tasks.push(task);
  }

  async join(): Promise<void> {
    const signal = this.controller.signal;
    if (!signal.aborted) {
      await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
    }
    await Promise.allSettled(this.tasks);
    if (this.failure) throw this.failure.error;
  }

  private end(failure: { error: unknown } | null): void {
    if (this.ended) return;
    this.failure = failure;
    this.detachParent();
    this.controller.abort(failure ? failure.error : new GroupCompleted());
  }
}

class GroupCompleted extends Error {
  constructor() {
    super('Task group completed');
    this.name = 'AbortError';
  }
}
