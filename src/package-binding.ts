import type { DescFile, DescService } from '@bufbuild/protobuf';
import type { PackageGroup } from './collect-packages';
import type { NameResolver } from './names';
import type { ServiceBinding } from './service-binding';

export interface AggregateField {
  readonly name: string;
  readonly service: ServiceBinding;
}

export interface PackageBinding {
  readonly packageName: string;
  readonly identifier: string;
  readonly constructorName: string;
  /** `DemoServerName`: constant holding the package name. */
  readonly serverName: string;
  readonly packageDesc: string;
  /** `initDemoServer`: prepares the server side of the package. */
  readonly initFunction: string;
  /** Path of the generated aggregate file, without extension. */
  readonly fileName: string;
  /**
   * One per service, in first-seen order. A field is named by the unexported service identifier plus `Client`
   * (`echoClient` for service `Echo`), so it never shares a name with the exported `EchoClient` interface.
   */
  readonly fields: readonly AggregateField[];
  /** First file of the package; the aggregate is generated beside it. */
  readonly file: DescFile;
}

/**
 * Describes the umbrella type of a package: one client field per service, all sharing one connection.
 *
 * Every service of the group has to be bound already; a missing binding throws.
 */
export function bindPackage(
  group: PackageGroup,
  bound: ReadonlyMap<DescService, ServiceBinding>,
  names: NameResolver,
): PackageBinding {
  const services = group.services.map((desc) => {
    const service = bound.get(desc);

    if (!service) {
      throw new Error(`Service ${desc.typeName} is not bound yet; package ${group.name} cannot be aggregated`);
    }

    return service;
  });
  const fieldNames = names.resolveAll(
    services.map((service) => service.rawName),
    false,
    `package ${group.name}`,
  );
  const identifier = names.packageIdentifier(group.name);
  const file = group.files[0];
  const dir = file.name.includes('/') ? file.name.slice(0, file.name.lastIndexOf('/') + 1) : '';

  return {
    packageName: group.name,
    identifier,
    constructorName: `new${identifier}`,
    serverName: `${identifier}ServerName`,
    packageDesc: `${identifier}PackageDesc`,
    initFunction: `init${identifier}Server`,
    fileName: `${dir}${group.name.replace(/\./g, '_')}_pkg_rpc`,
    fields: services.map((service, index) => ({ name: `${fieldNames[index]}Client`, service })),
    file,
  };
}
