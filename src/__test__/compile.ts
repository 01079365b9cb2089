import path from 'node:path';
import { toBinary } from '@bufbuild/protobuf';
import { base64Encode } from '@bufbuild/protobuf/wire';
import { type FileDescriptorProto, FileDescriptorProtoSchema } from '@bufbuild/protobuf/wkt';
import ts from 'typescript';

/**
 * `_pb.ts` module in the shape protoc-gen-es writes for a file of field-less messages: an embedded file
 * descriptor, a type and a schema per message.
 */
export function pbModule(proto: FileDescriptorProto): [string, string] {
  const lines = [
    'import type { Message } from "@bufbuild/protobuf";',
    'import { type GenFile, type GenMessage, fileDesc, messageDesc } from "@bufbuild/protobuf/codegenv1";',
    '',
    `export const file: GenFile = fileDesc("${base64Encode(toBinary(FileDescriptorProtoSchema, proto))}");`,
  ];

  proto.messageType.forEach((message, index) => {
    lines.push(
      '',
      `export type ${message.name} = Message<"${proto.package}.${message.name}">;`,
      `export const ${message.name}Schema: GenMessage<${message.name}> = messageDesc(file, ${index});`,
    );
  });

  return [proto.name.replace(/\.proto$/, '_pb.ts'), `${lines.join('\n')}\n`];
}

/**
 * Type-checks in-memory modules under `strict`, resolving `switchboard-rpc` to this package's runtime contract.
 * Returns one line per diagnostic.
 */
export function typeCheck(files: ReadonlyMap<string, string>): string[] {
  const root = path.join(process.cwd(), '.in-memory');
  const sources = new Map([...files].map(([name, text]): [string, string] => [path.join(root, name), text]));
  const options: ts.CompilerOptions = {
    strict: true,
    noEmit: true,
    skipLibCheck: true,
    target: ts.ScriptTarget.ES2022,
    lib: ['lib.es2022.d.ts'],
    module: ts.ModuleKind.ESNext,
    moduleResolution: ts.ModuleResolutionKind.Bundler,
    types: ['node'],
    baseUrl: root,
    paths: { 'switchboard-rpc': [path.resolve(__dirname, '..', 'runtime.ts')] },
  };
  const host = ts.createCompilerHost(options);
  const { fileExists, readFile, getSourceFile, directoryExists } = host;
  const directories = new Set(
    [...sources.keys()].flatMap((fileName) => {
      const parents: string[] = [];

      for (let dir = path.dirname(fileName); dir !== path.dirname(dir); dir = path.dirname(dir)) parents.push(dir);

      return parents;
    }),
  );

  host.directoryExists = (directoryName) =>
    directories.has(path.resolve(directoryName)) || (directoryExists?.call(host, directoryName) ?? true);
  host.fileExists = (fileName) => sources.has(fileName) || fileExists.call(host, fileName);
  host.readFile = (fileName) => sources.get(fileName) ?? readFile.call(host, fileName);
  host.getSourceFile = (fileName, languageVersion, onError, shouldCreateNewSourceFile) => {
    const text = sources.get(fileName);

    return text === undefined
      ? getSourceFile.call(host, fileName, languageVersion, onError, shouldCreateNewSourceFile)
      : ts.createSourceFile(fileName, text, languageVersion);
  };

  const program = ts.createProgram([...sources.keys()], options, host);

  return ts.getPreEmitDiagnostics(program).map((diagnostic) => {
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');

    return diagnostic.file ? `${path.relative(root, diagnostic.file.fileName)}: ${message}` : message;
  });
}

export type ModuleExports = Record<string, unknown>;

/**
 * Transpiles in-memory modules to CommonJS and evaluates them on demand. Relative imports resolve among `files`;
 * anything else has to be listed in `external`.
 */
export function moduleLoader(
  files: ReadonlyMap<string, string>,
  external: Readonly<Record<string, unknown>>,
): (name: string) => ModuleExports {
  const cache = new Map<string, ModuleExports>();

  const load = (name: string): ModuleExports => {
    const cached = cache.get(name);

    if (cached) return cached;

    const source = files.get(name);

    if (source === undefined) {
      throw new Error(`${name} was not generated`);
    }

    const moduleExports: ModuleExports = {};
    const { outputText } = ts.transpileModule(source, {
      fileName: name,
      compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 },
    });
    const requireModule = (specifier: string): unknown => {
      if (specifier.startsWith('.')) {
        const resolved = path.posix.join(path.posix.dirname(name), specifier).replace(/\.js$/, '');

        return load(`${resolved}.ts`);
      }
      if (Object.hasOwn(external, specifier)) {
        return external[specifier];
      }

      throw new Error(`${name} imports ${specifier}, which is not available`);
    };

    cache.set(name, moduleExports);
    new Function('exports', 'require', outputText)(moduleExports, requireModule);

    return moduleExports;
  };

  return load;
}

export function member(target: unknown, key: string): unknown {
  if (typeof target !== 'object' || target === null || !(key in target)) {
    throw new Error(`${key} is missing`);
  }

  return Reflect.get(target, key);
}

/** Calls `target[key](...args)` with `target` as `this`. */
export function invoke(target: unknown, key: string, ...args: unknown[]): unknown {
  const fn = member(target, key);

  if (typeof fn !== 'function') {
    throw new Error(`${key} is not a function`);
  }

  return fn.apply(target, args);
}
