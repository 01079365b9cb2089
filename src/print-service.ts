import type { GeneratedFile } from '@bufbuild/protoplugin';
import type { MethodBinding, ServiceBinding } from './service-binding';

/**
 * Version of the generated code. Increment whenever the emitted shape changes incompatibly; the generated code
 * references `SUPPORT_PACKAGE_IS_VERSION_{n}` from the runtime module.
 */
export const GENERATED_CODE_VERSION = 1;

export interface RenderOptions {
  /** Module the generated code imports the runtime contract from. */
  runtimeModule: string;
}

type ImportSymbol = ReturnType<GeneratedFile['import']>;

export function importRuntime(
  f: GeneratedFile,
  options: RenderOptions,
  name: string,
  typeOnly = true,
): ImportSymbol {
  return f.import(name, options.runtimeModule, typeOnly);
}

export function supportVersionMarker(f: GeneratedFile, options: RenderOptions): ImportSymbol {
  return importRuntime(f, options, `SUPPORT_PACKAGE_IS_VERSION_${GENERATED_CODE_VERSION}`, false);
}

export function printService(f: GeneratedFile, service: ServiceBinding, options: RenderOptions) {
  printStreamHandles(f, service, options);
  printClientInterface(f, service, options);
  f.print();
  printClientImplementation(f, service, options);
  f.print();
  printClientFactory(f, service, options);
  f.print();
  printServerInterface(f, service, options);
  f.print();
  printServiceDesc(f, service, options);
  f.print();
  printRegisterFunction(f, service, options);
}

function printStreamHandles(f: GeneratedFile, service: ServiceBinding, options: RenderOptions) {
  const StreamHandle = importRuntime(f, options, 'StreamHandle');

  for (const method of service.methods) {
    if (method.streamHandle === undefined) continue;

    f.print`${f.export('type', method.streamHandle)} = ${StreamHandle}<${f.importShape(method.input)}, ${f.importShape(method.output)}>;`;
    f.print();
  }
}

export function printClientInterface(
  f: GeneratedFile,
  service: ServiceBinding,
  options: RenderOptions,
) {
  f.print(f.jsDoc(service.desc));
  f.print`${f.export('interface', service.clientInterface)} {`;
  service.methods.forEach((method, index) => {
    if (index !== 0) {
      f.print();
    }

    f.print(f.jsDoc(method.desc, '  '));
    f.print`  ${clientSignature(f, method, options)};`;
  });
  f.print`}`;
}

export function printClientImplementation(
  f: GeneratedFile,
  service: ServiceBinding,
  options: RenderOptions,
) {
  const Connection = importRuntime(f, options, 'Connection');

  f.print`${f.export('class', service.clientImplementation)} implements ${service.clientInterface} {`;
  f.print`  readonly #connection: ${Connection};`;
  f.print();
  f.print`  constructor(connection: ${Connection}) {`;
  f.print`    this.#connection = connection;`;
  f.print`  }`;

  for (const method of service.methods) {
    const types = [
      '{ input: ',
      f.importSchema(method.input),
      ', output: ',
      f.importSchema(method.output),
      ' }',
    ];

    f.print();
    f.print`  ${clientSignature(f, method, options)} {`;
    f.print`    const connection = this.#connection;`;
    if (method.streamHandle === undefined) {
      f.print`    return connection.call(${f.string(service.rawName)}, ${f.string(method.rawName)}, request, options, ${types});`;
    } else {
      const request = method.clientStreaming ? 'undefined' : 'request';

      f.print`    return connection.stream(${f.string(service.rawName)}, ${f.string(method.rawName)}, ${request}, options, ${types});`;
    }
    f.print`  }`;
  }
  f.print`}`;
}

function printClientFactory(f: GeneratedFile, service: ServiceBinding, options: RenderOptions) {
  const Transport = importRuntime(f, options, 'Transport');
  const ConnectOptions = importRuntime(f, options, 'ConnectOptions');

  f.print`/**`;
  f.print` * Opens a dedicated connection for ${service.rawName}. Use the package aggregate to share one connection between services.`;
  f.print` */`;
  f.print`${f.export('async function', service.clientFactory)}(transport: ${Transport}, options?: ${ConnectOptions}): Promise<${service.clientInterface}> {`;
  f.print`  const connection = transport.connect(${f.string(service.packageName)}, options);`;
  f.print`  await connection.start();`;
  f.print`  return new ${service.clientImplementation}(connection);`;
  f.print`}`;
}

/**
 * The server contract is structural: any handler object with matching methods satisfies it.
 */
export function printServerInterface(
  f: GeneratedFile,
  service: ServiceBinding,
  options: RenderOptions,
) {
  const HandlerContext = importRuntime(f, options, 'HandlerContext');
  const Observable = f.import('Observable', 'rxjs', true);

  f.print(f.jsDoc(service.desc));
  f.print`${f.export('interface', service.serverInterface)} {`;
  service.methods.forEach((method, index) => {
    if (index !== 0) {
      f.print();
    }

    const ReqType = f.importShape(method.input);
    const ResType = f.importShape(method.output);
    const req = method.clientStreaming
      ? ['requests: ', Observable, '<', ReqType, '>']
      : ['request: ', ReqType];
    const res = method.serverStreaming
      ? [Observable, '<', ResType, '>']
      : [ResType, ' | Promise<', ResType, '>'];

    f.print(f.jsDoc(method.desc, '  '));
    f.print`  ${method.identifier}(${req}, context: ${HandlerContext}): ${res};`;
  });
  f.print`}`;
}

export function printServiceDesc(f: GeneratedFile, service: ServiceBinding, options: RenderOptions) {
  const ServiceDesc = importRuntime(f, options, 'ServiceDesc');
  const methods = service.registry.flatMap((name, index) =>
    index === 0 ? [f.string(name)] : [', ', f.string(name)],
  );

  f.print`${f.export('const', service.serviceDesc)}: ${ServiceDesc} = {`;
  f.print`  serviceName: ${f.string(service.rawName)},`;
  f.print`  methods: [${methods}],`;
  f.print`  supportPackageVersion: ${supportVersionMarker(f, options)},`;
  f.print`};`;
}

function printRegisterFunction(f: GeneratedFile, service: ServiceBinding, options: RenderOptions) {
  const ServiceRegistrar = importRuntime(f, options, 'ServiceRegistrar');

  f.print`${f.export('function', service.registerFunction)}(registrar: ${ServiceRegistrar}, server: ${service.serverInterface}): void {`;
  f.print`  registrar.handleService(${service.serviceDesc}, server);`;
  f.print`}`;
}

function clientSignature(f: GeneratedFile, method: MethodBinding, options: RenderOptions) {
  const CallOptions = importRuntime(f, options, 'CallOptions');
  const req = method.clientStreaming ? [] : ['request: ', f.importShape(method.input), ', '];
  const res =
    method.streamHandle === undefined
      ? ['Promise<', f.importShape(method.output), '>']
      : [method.streamHandle];

  return [method.identifier, '(', ...req, 'options?: ', CallOptions, '): ', ...res];
}
