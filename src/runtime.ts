import type { DescMessage, MessageShape } from '@bufbuild/protobuf';
import type { Observable } from 'rxjs';

/**
 * Compatibility marker referenced by every generated file.
 *
 * A runtime that no longer exports the marker a file was generated against fails the build of that file.
 */
export const SUPPORT_PACKAGE_IS_VERSION_1 = 1;

export type SupportPackageVersion = typeof SUPPORT_PACKAGE_IS_VERSION_1;

export interface CallOptions {
  signal?: AbortSignal;
  /** Deadline for the call, in milliseconds. */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface ConnectOptions {
  endpoint?: string;
  /** Applied to every call unless overridden per call. */
  defaultCallOptions?: CallOptions;
}

/**
 * Message schemas of one method, handed to the runtime so it can encode requests and decode responses.
 */
export interface MethodTypes<I extends DescMessage, O extends DescMessage> {
  readonly input: I;
  readonly output: O;
}

/**
 * Handle to a streaming call. For server streaming the request travels with the call and `send` is not used.
 */
export interface StreamHandle<I, O> {
  readonly responses: Observable<O>;
  send(message: I): void;
  /** Half-close: no more messages from the client. */
  complete(): void;
}

/**
 * One connection scoped to a protobuf package. Every client of the package shares it, possibly concurrently.
 */
export interface Connection {
  start(): Promise<void>;

  call<I extends DescMessage, O extends DescMessage>(
    service: string,
    method: string,
    request: MessageShape<I>,
    options: CallOptions | undefined,
    types: MethodTypes<I, O>,
  ): Promise<MessageShape<O>>;

  stream<I extends DescMessage, O extends DescMessage>(
    service: string,
    method: string,
    request: MessageShape<I> | undefined,
    options: CallOptions | undefined,
    types: MethodTypes<I, O>,
  ): StreamHandle<MessageShape<I>, MessageShape<O>>;
}

export interface Transport {
  connect(scope: string, options?: ConnectOptions): Connection;
}

/**
 * Static descriptor of a service. `methods` lists the unary methods the runtime may route to, by name.
 */
export interface ServiceDesc {
  readonly serviceName: string;
  readonly methods: readonly string[];
  readonly supportPackageVersion: SupportPackageVersion;
}

export interface PackageDesc {
  readonly packageName: string;
  readonly services: readonly ServiceDesc[];
  readonly supportPackageVersion: SupportPackageVersion;
}

export interface HandlerContext {
  readonly service: string;
  readonly method: string;
  readonly signal: AbortSignal;
  readonly headers: Readonly<Record<string, string>>;
}

export interface ServeOptions {
  /** Address the package's server listens on; the runtime picks one when absent. */
  readonly endpoint?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface ServiceRegistrar {
  /** Prepares the server side of a package. Generated `initXServer` functions call it once per package. */
  init(desc: PackageDesc, options?: ServeOptions): void;
  handleService(desc: ServiceDesc, implementation: object): void;
}
