import { type DescFile, create, createFileRegistry } from '@bufbuild/protobuf';
import {
  CodeGeneratorRequestSchema,
  type FileDescriptorProto,
  FileDescriptorProtoSchema,
  FileDescriptorSetSchema,
} from '@bufbuild/protobuf/wkt';
import type { Plugin } from '@bufbuild/protoplugin';
import { protocGenSwitchboard } from '../protoc-gen-switchboard-plugin';

export interface MethodSpec {
  name: string;
  input: string;
  output: string;
  clientStreaming?: boolean;
  serverStreaming?: boolean;
}

export interface ServiceSpec {
  name: string;
  methods: MethodSpec[];
}

export interface ProtoSpec {
  name: string;
  package: string;
  messages?: string[];
  services?: ServiceSpec[];
  dependency?: string[];
}

export function protoFile(spec: ProtoSpec): FileDescriptorProto {
  return create(FileDescriptorProtoSchema, {
    name: spec.name,
    package: spec.package,
    syntax: 'proto3',
    dependency: spec.dependency ?? [],
    messageType: (spec.messages ?? []).map((name) => ({ name })),
    service: (spec.services ?? []).map((service) => ({
      name: service.name,
      method: service.methods.map((method) => ({
        name: method.name,
        inputType: method.input,
        outputType: method.output,
        clientStreaming: method.clientStreaming ?? false,
        serverStreaming: method.serverStreaming ?? false,
      })),
    })),
  });
}

/**
 * Builds a registry from the given files and returns their descriptors, in the same order.
 */
export function loadFiles(protos: FileDescriptorProto[]): DescFile[] {
  const registry = createFileRegistry(create(FileDescriptorSetSchema, { file: protos }));

  return protos.map((proto) => {
    const file = registry.getFile(proto.name);

    if (!file) {
      throw new Error(`${proto.name} missing from registry`);
    }

    return file;
  });
}

/**
 * Runs a plugin in process and returns the generated files by name.
 */
export function runPlugin(
  protos: FileDescriptorProto[],
  parameter = '',
  plugin: Plugin = protocGenSwitchboard,
): Map<string, string> {
  const request = create(CodeGeneratorRequestSchema, {
    fileToGenerate: protos.map((proto) => proto.name),
    parameter: parameter === '' ? 'target=ts' : `target=ts,${parameter}`,
    protoFile: protos,
  });
  const response = plugin.run(request);

  return new Map(response.file.map((file) => [file.name, file.content]));
}

export function linesOf(content: string | undefined): string[] {
  if (content === undefined) {
    throw new Error('file was not generated');
  }

  return content.split('\n');
}

/** `demo/echo.proto`: package demo, service Echo with a unary Say. */
export const echoProto = () =>
  protoFile({
    name: 'demo/echo.proto',
    package: 'demo',
    messages: ['Input', 'Output'],
    services: [
      {
        name: 'Echo',
        methods: [{ name: 'Say', input: '.demo.Input', output: '.demo.Output' }],
      },
    ],
  });
