import type { DescFile, DescService } from '@bufbuild/protobuf';
import { ConfigurationError } from './errors';

export interface PackageGroup {
  readonly name: string;
  /** Files contributing at least one service, in processing order. */
  readonly files: readonly DescFile[];
  readonly services: readonly DescService[];
}

/**
 * Groups the services of all files by protobuf package.
 *
 * Packages keep their first-seen order, and services of a package are concatenated in file order.
 * Files without services are passed over.
 */
export function collectPackages(files: readonly DescFile[]): Map<string, PackageGroup> {
  const groups = new Map<string, { name: string; files: DescFile[]; services: DescService[] }>();

  for (const file of files) {
    if (file.services.length === 0) continue;

    const name = file.proto.package;

    if (name === '') {
      throw new ConfigurationError(
        `${file.proto.name} declares services but no package; a package name is required`,
      );
    }

    let group = groups.get(name);

    if (!group) {
      group = { name, files: [], services: [] };
      groups.set(name, group);
    }

    group.files.push(file);
    group.services.push(...file.services);
  }

  return groups;
}
