import type { DescFile, DescService } from '@bufbuild/protobuf';
import type { GeneratedFile } from '@bufbuild/protoplugin';
import { collectPackages } from './collect-packages';
import { NameCollisionError } from './errors';
import type { Logger } from './logger';
import { DEFAULT_RESERVED_NAMES, NameResolver } from './names';
import { OnceGate } from './once';
import { type PackageBinding, bindPackage } from './package-binding';
import { printPackage } from './print-package';
import { type RenderOptions, printService } from './print-service';
import { type ServiceBinding, bindService } from './service-binding';

export interface GenerationConfig extends RenderOptions {
  /** Added to `DEFAULT_RESERVED_NAMES`. */
  reservedNames: readonly string[];
}

export interface FilePlan {
  readonly file: DescFile;
  readonly services: readonly ServiceBinding[];
}

export interface GenerationPlan {
  /** Files with at least one service, in request order. */
  readonly files: readonly FilePlan[];
  readonly packages: readonly PackageBinding[];
}

/**
 * Binds every service and package of the request. Pure: nothing is generated, so any error thrown here
 * leaves the response empty.
 */
export function planGeneration(
  files: readonly DescFile[],
  config: Pick<GenerationConfig, 'reservedNames'>,
): GenerationPlan {
  const names = new NameResolver([...DEFAULT_RESERVED_NAMES, ...config.reservedNames]);
  const groups = collectPackages(files);
  const bound = new Map<DescService, ServiceBinding>();
  const plans: FilePlan[] = [];

  for (const file of files) {
    if (file.services.length === 0) continue;

    const services = file.services.map((service) => {
      const binding = bindService(service, names);

      bound.set(service, binding);

      return binding;
    });

    plans.push({ file, services });
  }

  const packages = [...groups.values()].map((group) => bindPackage(group, bound, names));

  assertDistinct(
    packages.map((pkg): [string, string] => [pkg.identifier, pkg.packageName]),
    'package identifiers',
  );
  assertDistinct(
    [
      ...plans.map(({ file }): [string, string] => [`${file.name}_rpc.ts`, file.proto.name]),
      ...packages.map((pkg): [string, string] => [`${pkg.fileName}.ts`, `package ${pkg.packageName}`]),
    ],
    'generated files',
  );

  return { files: plans, packages };
}

/**
 * Throws `NameCollisionError` for the first name claimed twice. Each entry is `[name, owner]`.
 */
function assertDistinct(entries: readonly (readonly [string, string])[], scope: string): void {
  const owners = new Map<string, string>();

  for (const [name, owner] of entries) {
    const previous = owners.get(name);

    if (previous !== undefined) {
      throw new NameCollisionError(name, scope, [previous, owner]);
    }

    owners.set(name, owner);
  }
}

export interface EmitHost {
  generateFile(name: string): GeneratedFile;
}

/**
 * Writes a plan in two stages: service files first, then one aggregate per package.
 *
 * An aggregate is written at most once per package name, and only after every file contributing to that
 * package has been written.
 */
export class PlanEmitter {
  private readonly emittedFiles = new Set<DescFile>();
  private readonly aggregates = new OnceGate<string>();

  constructor(
    private readonly host: EmitHost,
    private readonly options: RenderOptions,
    private readonly logger: Logger,
  ) {}

  emit(plan: GenerationPlan): void {
    for (const file of plan.files) {
      this.emitServices(file);
    }
    for (const pkg of plan.packages) {
      this.emitAggregate(pkg);
    }
  }

  emitServices({ file, services }: FilePlan): void {
    const f = this.host.generateFile(`${file.name}_rpc.ts`);

    f.preamble(file);

    services.forEach((service, index) => {
      if (index !== 0) {
        f.print();
      }
      printService(f, service, this.options);
    });

    this.emittedFiles.add(file);
    this.logger.debug(`${file.proto.name}: ${services.length} service(s)`);
  }

  /**
   * Returns the name of the generated aggregate file. Later calls for the same package return the same name
   * and write nothing.
   */
  emitAggregate(pkg: PackageBinding): string {
    const { value, fresh } = this.aggregates.run(pkg.packageName, () => {
      const pending = pkg.fields.filter((field) => !this.emittedFiles.has(field.service.desc.file));

      if (pending.length !== 0) {
        throw new Error(
          `Package ${pkg.packageName} aggregated before ${pending.map((field) => field.service.typeName).join(', ')} was emitted`,
        );
      }

      const name = `${pkg.fileName}.ts`;
      const f = this.host.generateFile(name);

      f.preamble(pkg.file);
      printPackage(f, pkg, this.options);

      return name;
    });

    if (fresh) {
      this.logger.debug(`package ${pkg.packageName}: ${pkg.fields.length} client(s) in ${value}`);
    }

    return value;
  }
}
