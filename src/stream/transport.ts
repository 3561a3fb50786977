import type { Observable } from 'rxjs';
import type { SinkStreamRequestWire } from './wire';

/**
 * One open bidirectional SinkStream call
 * Sends never wait on receives; responses$ replays everything received since open
 */
export interface SinkStreamChannel {
  send(request: SinkStreamRequestWire): void;
  /** Half-close the send side */
  end(): void;
  readonly responses$: Observable<object>;
  close(): void;
}

export interface SinkStreamTransport {
  open(endpoint: string): SinkStreamChannel;
}

export const SINK_STREAM_TRANSPORT = Symbol('SINK_STREAM_TRANSPORT');
