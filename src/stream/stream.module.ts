import { Module } from '@nestjs/common';
import { GrpcSinkStreamTransport } from './grpc-transport.service';
import { StreamDriverService } from './stream-driver.service';
import { SINK_STREAM_TRANSPORT } from './transport';

/**
 * Stream module wires the driver to the gRPC transport
 * Tests swap SINK_STREAM_TRANSPORT for an in-process channel
 */
@Module({
  providers: [
    StreamDriverService,
    { provide: SINK_STREAM_TRANSPORT, useClass: GrpcSinkStreamTransport },
  ],
  exports: [StreamDriverService],
})
export class StreamModule {}
