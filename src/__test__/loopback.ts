import type { DescMessage, MessageShape } from '@bufbuild/protobuf';
import { create } from '@bufbuild/protobuf';
import { Subject } from 'rxjs';
import type {
  CallOptions,
  ConnectOptions,
  Connection,
  MethodTypes,
  PackageDesc,
  ServeOptions,
  ServiceDesc,
  ServiceRegistrar,
  StreamHandle,
  Transport,
} from '../runtime';

export interface LoopbackFailures {
  /** Rejects every `start()`. */
  start?: Error;
  /** Rejects every unary call. */
  call?: Error;
}

export interface RecordedCall {
  service: string;
  method: string;
  request: unknown;
  options: CallOptions | undefined;
  /** Type name of the response schema handed to the connection. */
  output: string;
}

/**
 * In-process transport answering every unary call with an empty response message.
 */
export class LoopbackTransport implements Transport {
  readonly scopes: { scope: string; options: ConnectOptions | undefined }[] = [];
  readonly calls: RecordedCall[] = [];
  readonly streams: { service: string; method: string; request: unknown }[] = [];

  constructor(private readonly failures: LoopbackFailures = {}) {}

  connect(scope: string, options?: ConnectOptions): Connection {
    this.scopes.push({ scope, options });

    const { calls, streams, failures } = this;

    return {
      async start() {
        if (failures.start) throw failures.start;
      },
      async call<I extends DescMessage, O extends DescMessage>(
        service: string,
        method: string,
        request: MessageShape<I>,
        options: CallOptions | undefined,
        types: MethodTypes<I, O>,
      ): Promise<MessageShape<O>> {
        calls.push({ service, method, request, options, output: types.output.typeName });

        if (failures.call) throw failures.call;

        return create(types.output);
      },
      stream<I extends DescMessage, O extends DescMessage>(
        service: string,
        method: string,
        request: MessageShape<I> | undefined,
      ): StreamHandle<MessageShape<I>, MessageShape<O>> {
        const responses = new Subject<MessageShape<O>>();

        streams.push({ service, method, request });

        return {
          responses: responses.asObservable(),
          send() {},
          complete: () => responses.complete(),
        };
      },
    };
  }
}

/**
 * Registrar that records what the generated server functions hand it, in order.
 */
export class RecordingRegistrar implements ServiceRegistrar {
  readonly events: string[] = [];
  readonly serveOptions: (ServeOptions | undefined)[] = [];
  readonly implementations = new Map<string, object>();

  init(desc: PackageDesc, options?: ServeOptions): void {
    this.events.push(`init ${desc.packageName}: ${desc.services.map((service) => service.serviceName).join(', ')}`);
    this.serveOptions.push(options);
  }

  handleService(desc: ServiceDesc, implementation: object): void {
    this.events.push(`service ${desc.serviceName}: ${desc.methods.join(', ')}`);
    this.implementations.set(desc.serviceName, implementation);
  }
}
