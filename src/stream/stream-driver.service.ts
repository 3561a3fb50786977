import { Inject, Injectable, Logger } from '@nestjs/common';
import { eachValueFrom } from 'rxjs-for-await';
import { StreamCorrelationError, errorMessage } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import { describeMessage, type Session } from '../protocol/messages';
import { SINK_STREAM_TRANSPORT, type SinkStreamTransport } from './transport';
import { responseKind, toWireRequest } from './wire';

export type RunResult =
  | { ok: true; responses: number }
  | { ok: false; error: StreamCorrelationError };

/**
 * Drives one session over one bidirectional channel
 * Writes every request first, then expects exactly one response per request, in order
 */
@Injectable()
export class StreamDriverService {
  private readonly logger = new Logger(StreamDriverService.name);

  constructor(
    @Inject(SINK_STREAM_TRANSPORT) private readonly transport: SinkStreamTransport,
  ) {}

  async run(session: Session, endpoint: string): Promise<RunResult> {
    const channel = this.transport.open(endpoint);
    const responses = eachValueFrom(channel.responses$);

    try {
      for (const message of session.messages) {
        channel.send(toWireRequest(message));
      }
      channel.end();
      this.logger.debug(`Sent ${session.messages.length} requests to ${endpoint}`);

      for (const [index, message] of session.messages.entries()) {
        this.logger.log(`REQUEST ${index}: ${describeMessage(message)}`);

        let next: IteratorResult<object>;
        try {
          next = await responses.next();
        } catch (error) {
          return this.fail(
            new StreamCorrelationError(
              index,
              `Stream failed awaiting response ${index} to ${message.kind}: ${errorMessage(error)}`,
              { cause: error },
            ),
          );
        }

        if (next.done) {
          return this.fail(
            new StreamCorrelationError(
              index,
              `Response stream ended after ${index} of ${session.messages.length} responses (awaiting ${message.kind})`,
            ),
          );
        }

        this.logger.log(`RESPONSE OK ${index}: ${responseKind(next.value) ?? 'unknown'} ${truncateForLog(next.value)}`);
      }

      this.logger.log(`All ${session.messages.length} requests acknowledged`);
      return { ok: true, responses: session.messages.length };
    } finally {
      await responses.return?.();
      channel.close();
    }
  }

  private fail(error: StreamCorrelationError): RunResult {
    this.logger.error(`Integration test failed: ${error.message}`);
    return { ok: false, error };
  }
}
