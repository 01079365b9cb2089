import { createEcmaScriptPlugin } from '@bufbuild/protoplugin';
import { describe, expect, it } from 'vitest';
import { ConfigurationError, NameCollisionError } from '../errors';
import { type GenerationPlan, PlanEmitter, planGeneration } from '../generate';
import { Logger } from '../logger';
import { echoProto, loadFiles, protoFile, runPlugin } from './util';

const options = { runtimeModule: 'switchboard-rpc' };
const quiet = new Logger('test', 'error');

/**
 * A plugin that plans normally and lets the test drive the emitter.
 */
function drivingPlugin(drive: (emitter: PlanEmitter, plan: GenerationPlan) => void) {
  return createEcmaScriptPlugin({
    name: 'protoc-gen-test',
    version: 'v0.0.0',
    generateTs(schema) {
      const plan = planGeneration(schema.files, { reservedNames: [] });

      drive(new PlanEmitter(schema, options, quiet), plan);
    },
  });
}

describe('planGeneration', () => {
  it('binds files with services and every package', () => {
    const files = loadFiles([
      protoFile({ name: 'demo/types.proto', package: 'demo', messages: ['Shared'] }),
      echoProto(),
    ]);
    const plan = planGeneration(files, { reservedNames: [] });

    expect(plan.files.map(({ file }) => file.name)).toEqual(['demo/echo']);
    expect(plan.files[0].services.map((service) => service.identifier)).toEqual(['Echo']);
    expect(plan.packages.map((pkg) => pkg.identifier)).toEqual(['Demo']);
  });

  it('adds configured reserved names to the defaults', () => {
    const files = loadFiles([echoProto()]);
    const plan = planGeneration(files, { reservedNames: ['Say'] });

    expect(plan.files[0].services[0].methods[0].identifier).toBe('say_');
  });

  it('fails before anything is emitted', () => {
    const files = loadFiles([
      echoProto(),
      protoFile({
        name: 'loose.proto',
        package: '',
        messages: ['Req', 'Res'],
        services: [{ name: 'Loose', methods: [{ name: 'Do', input: '.Req', output: '.Res' }] }],
      }),
    ]);

    expect(() => planGeneration(files, { reservedNames: [] })).toThrow(ConfigurationError);
  });

  it('rejects packages that resolve to the same identifier', () => {
    const files = loadFiles([
      protoFile({
        name: 'x/a.proto',
        package: 'foo.bar',
        messages: ['Req', 'Res'],
        services: [{ name: 'A', methods: [{ name: 'Do', input: '.foo.bar.Req', output: '.foo.bar.Res' }] }],
      }),
      protoFile({
        name: 'x/b.proto',
        package: 'foo_bar',
        messages: ['Req', 'Res'],
        services: [{ name: 'B', methods: [{ name: 'Do', input: '.foo_bar.Req', output: '.foo_bar.Res' }] }],
      }),
    ]);
    let error: unknown;

    try {
      planGeneration(files, { reservedNames: [] });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(NameCollisionError);
    expect(error).toMatchObject({
      identifier: 'FooBar',
      scope: 'package identifiers',
      rawNames: ['foo.bar', 'foo_bar'],
    });
  });

  it('rejects a service file that takes the name of an aggregate', () => {
    const files = loadFiles([
      protoFile({
        name: 'demo/demo_pkg.proto',
        package: 'demo',
        messages: ['Input', 'Output'],
        services: [{ name: 'Echo', methods: [{ name: 'Say', input: '.demo.Input', output: '.demo.Output' }] }],
      }),
    ]);

    expect(() => planGeneration(files, { reservedNames: [] })).toThrow(
      '"demo/demo_pkg.proto" and "package demo" both resolve to "demo/demo_pkg_rpc.ts" in generated files',
    );
  });
});

describe('PlanEmitter', () => {
  it('writes an aggregate once however often it is asked', () => {
    const names: string[] = [];
    const plugin = drivingPlugin((emitter, plan) => {
      for (const file of plan.files) {
        emitter.emitServices(file);
      }
      for (const pkg of [...plan.packages, ...plan.packages]) {
        names.push(emitter.emitAggregate(pkg));
      }
    });

    const generated = runPlugin([echoProto()], '', plugin);

    expect([...generated.keys()]).toEqual(['demo/echo_rpc.ts', 'demo/demo_pkg_rpc.ts']);
    expect(names).toEqual(['demo/demo_pkg_rpc.ts', 'demo/demo_pkg_rpc.ts']);
  });

  it('refuses to aggregate a package before its services are written', () => {
    const feed = protoFile({
      name: 'demo/feed.proto',
      package: 'demo',
      messages: ['Query', 'Update'],
      services: [{ name: 'Feed', methods: [{ name: 'Get', input: '.demo.Query', output: '.demo.Update' }] }],
    });
    const plugin = drivingPlugin((emitter, plan) => {
      emitter.emitServices(plan.files[0]);
      emitter.emitAggregate(plan.packages[0]);
    });

    expect(() => runPlugin([echoProto(), feed], '', plugin)).toThrow(
      'Package demo aggregated before demo.Feed was emitted',
    );
  });
});
