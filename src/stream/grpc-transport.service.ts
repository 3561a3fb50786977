import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, credentials } from '@grpc/grpc-js';
import { loadSync, type AnyDefinition, type MethodDefinition, type ServiceDefinition } from '@grpc/proto-loader';
import { dirname } from 'path';
import { ReplaySubject } from 'rxjs';
import type { HarnessConfig } from '../config/harness.config';
import { errorMessage } from '../common/errors';
import type { SinkStreamChannel, SinkStreamTransport } from './transport';

const SERVICE_NAME = 'connector_service.ConnectorService';
const METHOD_NAME = 'SinkStream';

/**
 * Look up the bidirectional SinkStream method in the service definition
 * Throws if the proto file lacks the service or the method is not streaming both ways
 */
export function loadSinkStreamMethod(protoPath: string): MethodDefinition<object, object> {
  const definition = loadSync(protoPath, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
    includeDirs: [dirname(protoPath)],
  });

  const service = definition[SERVICE_NAME];
  if (!service || !isServiceDefinition(service)) {
    throw new Error(`Service ${SERVICE_NAME} not found in ${protoPath}`);
  }

  const method = service[METHOD_NAME];
  if (!method) {
    throw new Error(`Method ${METHOD_NAME} not found on ${SERVICE_NAME}`);
  }
  if (!method.requestStream || !method.responseStream) {
    throw new Error(`${SERVICE_NAME}/${METHOD_NAME} is not a bidirectional streaming method`);
  }
  return method;
}

function isServiceDefinition(definition: AnyDefinition): definition is ServiceDefinition {
  return !('format' in definition);
}

/**
 * SinkStream transport over gRPC
 * The service definition is loaded from the proto file when the provider is created
 */
@Injectable()
export class GrpcSinkStreamTransport implements SinkStreamTransport, OnModuleDestroy {
  private readonly logger = new Logger(GrpcSinkStreamTransport.name);
  private readonly method: MethodDefinition<object, object>;
  private readonly clients = new Set<Client>();

  constructor(configService: ConfigService) {
    const config = configService.get<HarnessConfig>('harness');
    if (!config) {
      throw new Error('Harness configuration not found');
    }
    this.method = loadSinkStreamMethod(config.protoPath);
    this.logger.debug(`Loaded ${this.method.path} from ${config.protoPath}`);
  }

  open(endpoint: string): SinkStreamChannel {
    this.logger.log(`Opening sink stream to ${endpoint}`);

    const client = new Client(endpoint, credentials.createInsecure());
    this.clients.add(client);

    const call = client.makeBidiStreamRequest(
      this.method.path,
      this.method.requestSerialize,
      this.method.responseDeserialize,
    );

    // Listeners go on before anything is written so no event is missed
    const responses$ = new ReplaySubject<object>();
    call.on('data', (response: object) => responses$.next(response));
    call.on('error', (error: Error) => responses$.error(error));
    call.on('end', () => responses$.complete());

    let closed = false;
    return {
      send: request => {
        call.write(request);
      },
      end: () => {
        call.end();
      },
      responses$: responses$.asObservable(),
      close: () => {
        if (closed) return;
        closed = true;
        call.cancel();
        client.close();
        this.clients.delete(client);
      },
    };
  }

  onModuleDestroy() {
    if (this.clients.size > 0) {
      this.logger.log(`Closing ${this.clients.size} gRPC clients`);
    }
    for (const client of this.clients) {
      try {
        client.close();
      } catch (error) {
        this.logger.error(`Error closing gRPC client: ${errorMessage(error)}`);
      }
    }
    this.clients.clear();
  }
}
