import type { DescMessage, DescMethod, DescService } from '@bufbuild/protobuf';
import type { NameResolver } from './names';

export interface MethodBinding {
  /** Name as declared in the schema; the runtime routes on this. */
  readonly rawName: string;
  /** Method name on the generated interfaces and class. */
  readonly identifier: string;
  readonly input: DescMessage;
  readonly output: DescMessage;
  readonly clientStreaming: boolean;
  readonly serverStreaming: boolean;
  /** Name of the per-method stream-handle type, for streaming methods only. */
  readonly streamHandle: string | undefined;
  readonly desc: DescMethod;
}

export interface ServiceBinding {
  readonly rawName: string;
  readonly typeName: string;
  readonly packageName: string;
  readonly identifier: string;
  readonly clientInterface: string;
  readonly clientImplementation: string;
  readonly clientFactory: string;
  readonly serverInterface: string;
  readonly serviceDesc: string;
  readonly registerFunction: string;
  readonly methods: readonly MethodBinding[];
  /** Raw names of the unary methods, in declared order. */
  readonly registry: readonly string[];
  readonly desc: DescService;
}

export function isUnary(method: Pick<MethodBinding, 'clientStreaming' | 'serverStreaming'>): boolean {
  return !method.clientStreaming && !method.serverStreaming;
}

/**
 * The dispatch table of a service: names of the methods with neither streaming flag, in declared order.
 *
 * Callers look methods up by name; positions in the table carry no meaning.
 */
export function buildRegistryTable(methods: readonly MethodBinding[]): string[] {
  return methods.filter(isUnary).map((method) => method.rawName);
}

export function bindService(service: DescService, names: NameResolver): ServiceBinding {
  const identifier = names.resolve(service.name, true);
  const methodIdentifiers = names.resolveAll(
    service.methods.map((method) => method.name),
    false,
    `service ${service.typeName}`,
  );
  const methods = service.methods.map((method, index) =>
    bindMethod(method, methodIdentifiers[index], identifier, names),
  );

  return {
    rawName: service.name,
    typeName: service.typeName,
    packageName: service.file.proto.package,
    identifier,
    clientInterface: `${identifier}Client`,
    clientImplementation: `${identifier}ClientImpl`,
    clientFactory: `new${identifier}Client`,
    serverInterface: `${identifier}Server`,
    serviceDesc: `${identifier}ServiceDesc`,
    registerFunction: `register${identifier}Server`,
    methods,
    registry: buildRegistryTable(methods),
    desc: service,
  };
}

function bindMethod(
  method: DescMethod,
  identifier: string,
  serviceIdentifier: string,
  names: NameResolver,
): MethodBinding {
  const clientStreaming =
    method.methodKind === 'client_streaming' || method.methodKind === 'bidi_streaming';
  const serverStreaming =
    method.methodKind === 'server_streaming' || method.methodKind === 'bidi_streaming';

  return {
    rawName: method.name,
    identifier,
    input: method.input,
    output: method.output,
    clientStreaming,
    serverStreaming,
    streamHandle:
      clientStreaming || serverStreaming
        ? `${serviceIdentifier}_${names.resolve(method.name, true)}Client`
        : undefined,
    desc: method,
  };
}
