import { type Schema, createEcmaScriptPlugin } from '@bufbuild/protoplugin';
import { version } from '../package.json';
import { ConfigurationError } from './errors';
import { PlanEmitter, planGeneration } from './generate';
import { type LogLevel, Logger, isLogLevel } from './logger';

export const DEFAULT_RUNTIME_MODULE = 'switchboard-rpc';

export const protocGenSwitchboard = createEcmaScriptPlugin({
  name: 'protoc-gen-switchboard',
  version: `v${version}`,
  parseOptions,
  generateTs,
});

export interface Options {
  /** Module the generated code imports the runtime contract from (default `switchboard-rpc`). */
  runtimeModule: string;
  /** Extra identifiers to suffix with `_`; repeat `reserved_name=` once per name. */
  reservedNames: string[];
  /** Generate a `{name}.ts` file for every proto file with services, with exports from `{name}_pb.ts` and `{name}_rpc.ts` for convenience. */
  exportFile: boolean;
  /** Verbosity of the diagnostics written to stderr (default `warn`). */
  logLevel: LogLevel;
}

export function parseOptions(options: { key: string; value: string }[]): Options {
  const result: Options = {
    runtimeModule: DEFAULT_RUNTIME_MODULE,
    reservedNames: [],
    exportFile: false,
    logLevel: 'warn',
  };

  for (const { key, value } of options) {
    if (key === 'runtime_module') {
      if (value === '') {
        throw new ConfigurationError('runtime_module requires a module specifier');
      }
      result.runtimeModule = value;
    } else if (key === 'reserved_name') {
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(value)) {
        throw new ConfigurationError(`reserved_name must be an identifier, got "${value}"`);
      }
      result.reservedNames.push(value);
    } else if (key === 'export_file') {
      result.exportFile = true;
    } else if (key === 'log_level') {
      if (!isLogLevel(value)) {
        throw new ConfigurationError(`log_level must be one of debug, info, warn, error; got "${value}"`);
      }
      result.logLevel = value;
    } else {
      throw new ConfigurationError(`Unknown option "${key}"`);
    }
  }

  return result;
}

function generateTs(schema: Schema<Options>) {
  const { options } = schema;
  const logger = new Logger('protoc-gen-switchboard', options.logLevel);

  logger.debug(`generating for ${schema.files.length} file(s)`, {
    runtimeModule: options.runtimeModule,
    reservedNames: options.reservedNames,
  });

  const plan = planGeneration(schema.files, options);

  new PlanEmitter(schema, options, logger).emit(plan);

  if (options.exportFile) {
    for (const { file } of plan.files) {
      const exportFile = schema.generateFile(`${file.name}.ts`);
      // biome-ignore lint/style/noNonNullAssertion: `paths` has at least 1 element
      const importName = file.name.split('/').at(-1)!;

      exportFile.print`export * from "./${importName}_pb";`;
      exportFile.print`export * from "./${importName}_rpc";`;
    }
  }
}
