import { EventEmitter } from 'events';
import { CancelledError, errorMessage } from './errors.js';
import type { Logger } from './types.js';

const INTERRUPT_EVENT = 'interrupt';

/**
 * Process-wide interrupt signal. Every call to {@link interrupt} bumps a
 * monotonically increasing generation and wakes every suspension point that
 * is currently racing a subscription.
 */
export class InterruptChannel {
  private current = 0;
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger?: Logger) {
    // one listener per in-flight suspension point; parallel batches can hold many
    this.emitter.setMaxListeners(0);
  }

  get generation(): number {
    return this.current;
  }

  interrupt(): number {
    this.current += 1;
    this.logger?.debug('Interrupt raised', { generation: this.current });
    this.emitter.emit(INTERRUPT_EVENT, this.current);
    return this.current;
  }

  subscribe(): InterruptSubscription {
    return new InterruptSubscription(this, this.current, this.logger);
  }

  /** @internal */
  listen(listener: (generation: number) => void): () => void {
    this.emitter.on(INTERRUPT_EVENT, listener);
    return () => {
      this.emitter.off(INTERRUPT_EVENT, listener);
    };
  }
}

/**
 * A view of the channel that remembers the last generation it acknowledged.
 * Cancellation is "the generation moved since I last acknowledged", so an
 * interrupt raised before a wait starts still cancels that wait.
 */
export class InterruptSubscription {
  private seen: number;

  constructor(
    private readonly channel: InterruptChannel,
    acknowledged: number,
    private readonly logger?: Logger
  ) {
    this.seen = acknowledged;
  }

  get acknowledged(): number {
    return this.seen;
  }

  hasChanged(): boolean {
    return this.channel.generation !== this.seen;
  }

  acknowledge(): void {
    this.seen = this.channel.generation;
  }

  fork(): InterruptSubscription {
    return new InterruptSubscription(this.channel, this.seen, this.logger);
  }

  /**
   * Settles with `operation` unless the generation changes first, in which
   * case it rejects with {@link CancelledError}. The losing operation keeps
   * running in the background; its outcome is discarded.
   */
  race<T>(operation: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let stop: () => void = () => undefined;

      const abandon = (generation: number): void => {
        if (settled) return;
        settled = true;
        stop();
        operation.then(
          () => this.logger?.debug('Abandoned operation finished after interrupt', { generation }),
          (error: unknown) =>
            this.logger?.debug('Abandoned operation failed after interrupt', {
              generation,
              error: errorMessage(error)
            })
        );
        reject(new CancelledError('Cancelled by user', generation));
      };

      if (this.hasChanged()) {
        abandon(this.channel.generation);
        return;
      }

      stop = this.channel.listen(abandon);

      operation.then(
        value => {
          if (settled) return;
          settled = true;
          stop();
          resolve(value);
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          stop();
          reject(error);
        }
      );
    });
  }
}

export function raceInterrupt<T>(
  operation: Promise<T>,
  subscription?: InterruptSubscription
): Promise<T> {
  return subscription ? subscription.race(operation) : operation;
}
