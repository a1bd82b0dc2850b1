import type { TurnEvent } from '../../../shared/types.js';

/**
 * Output channel owned by the active turn. `emit` may be called any number of
 * times; `finalize` is called exactly once, on commit, failure or cancellation.
 */
export interface StreamingSink {
  emit(event: TurnEvent): void;
  finalize(): void;
}

/** Wraps a sink so events after finalization are dropped and finalize runs once. */
export function guardSink(sink: StreamingSink): StreamingSink & { readonly finalized: boolean } {
  let finalized = false;
  return {
    get finalized() {
      return finalized;
    },
    emit(event) {
      if (!finalized) {
        sink.emit(event);
      }
    },
    finalize() {
      if (finalized) {
        return;
      }
      finalized = true;
      sink.finalize();
    }
  };
}

/** Sink that forwards each event to a callback, e.g. an SSE writer. */
export class CallbackSink implements StreamingSink {
  constructor(
    private readonly send: (event: TurnEvent) => void,
    private readonly onFinalize: () => void = () => {}
  ) {}

  emit(event: TurnEvent): void {
    this.send(event);
  }

  finalize(): void {
    this.onFinalize();
  }
}

/** Buffers everything; backs the non-streaming chat route and tests. */
export class CollectingSink implements StreamingSink {
  readonly events: TurnEvent[] = [];
  finalizeCount = 0;

  emit(event: TurnEvent): void {
    this.events.push(event);
  }

  finalize(): void {
    this.finalizeCount += 1;
  }

  tokens(): string {
    return this.events.map((event) => (event.type === 'token' ? event.content : '')).join('');
  }

  ofType<T extends TurnEvent['type']>(type: T): Array<Extract<TurnEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<TurnEvent, { type: T }> => event.type === type);
  }
}
