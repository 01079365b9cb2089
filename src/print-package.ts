import type { GeneratedFile } from '@bufbuild/protoplugin';
import type { PackageBinding } from './package-binding';
import { type RenderOptions, importRuntime, supportVersionMarker } from './print-service';

/**
 * Path the generated code of a service file is imported from, relative to the project root.
 */
export function serviceModulePath(fileName: string): string {
  return `./${fileName}_rpc.js`;
}

export function printPackage(f: GeneratedFile, pkg: PackageBinding, options: RenderOptions) {
  const Transport = importRuntime(f, options, 'Transport');
  const ConnectOptions = importRuntime(f, options, 'ConnectOptions');
  const PackageDesc = importRuntime(f, options, 'PackageDesc');
  const ServiceRegistrar = importRuntime(f, options, 'ServiceRegistrar');
  const ServeOptions = importRuntime(f, options, 'ServeOptions');

  const fields = pkg.fields.map((field) => {
    const from = serviceModulePath(field.service.desc.file.name);

    return {
      name: field.name,
      Client: f.import(field.service.clientInterface, from, true),
      ClientImpl: f.import(field.service.clientImplementation, from),
      ServiceDesc: f.import(field.service.serviceDesc, from),
    };
  });

  f.print`/**`;
  f.print` * Clients for every service in package ${pkg.packageName}.`;
  f.print` */`;
  f.print`${f.export('interface', pkg.identifier)} {`;
  for (const field of fields) {
    f.print`  readonly ${field.name}: ${field.Client};`;
  }
  f.print`}`;
  f.print();
  f.print`/**`;
  f.print` * Opens one connection for package ${pkg.packageName} and builds every client over it.`;
  f.print` * Rejects with the connection error if the connection cannot be started.`;
  f.print` */`;
  f.print`${f.export('async function', pkg.constructorName)}(transport: ${Transport}, options?: ${ConnectOptions}): Promise<${pkg.identifier}> {`;
  f.print`  const connection = transport.connect(${f.string(pkg.packageName)}, options);`;
  f.print`  await connection.start();`;
  f.print`  return {`;
  for (const field of fields) {
    f.print`    ${field.name}: new ${field.ClientImpl}(connection),`;
  }
  f.print`  };`;
  f.print`}`;
  f.print();

  const services = fields.flatMap((field, index) =>
    index === 0 ? [field.ServiceDesc] : [', ', field.ServiceDesc],
  );

  f.print`${f.export('const', pkg.serverName)} = ${f.string(pkg.packageName)};`;
  f.print();
  f.print`${f.export('const', pkg.packageDesc)}: ${PackageDesc} = {`;
  f.print`  packageName: ${pkg.serverName},`;
  f.print`  services: [${services}],`;
  f.print`  supportPackageVersion: ${supportVersionMarker(f, options)},`;
  f.print`};`;
  f.print();
  f.print`/**`;
  f.print` * Prepares the server side of package ${pkg.packageName}. Services are added afterwards through their register functions.`;
  f.print` */`;
  f.print`${f.export('function', pkg.initFunction)}(registrar: ${ServiceRegistrar}, options?: ${ServeOptions}): void {`;
  f.print`  registrar.init(${pkg.packageDesc}, options);`;
  f.print`}`;
}
