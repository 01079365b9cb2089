import * as codegenv1 from '@bufbuild/protobuf/codegenv1';
import type { FileDescriptorProto } from '@bufbuild/protobuf/wkt';
import * as rxjs from 'rxjs';
import { describe, expect, it } from 'vitest';
import * as runtime from '../runtime';
import { invoke, member, moduleLoader, pbModule, typeCheck } from './compile';
import { LoopbackTransport, RecordingRegistrar } from './loopback';
import { echoProto, protoFile, runPlugin } from './util';

const feedProto = () =>
  protoFile({
    name: 'demo/feed.proto',
    package: 'demo',
    messages: ['Query', 'Update', 'Chunk', 'Summary'],
    services: [
      {
        name: 'Feed',
        methods: [
          { name: 'Get', input: '.demo.Query', output: '.demo.Update' },
          { name: 'Watch', input: '.demo.Query', output: '.demo.Update', serverStreaming: true },
          { name: 'Upload', input: '.demo.Chunk', output: '.demo.Summary', clientStreaming: true },
        ],
      },
    ],
  });

/** Generated files plus a `_pb` module for every input file. */
function project(protos: FileDescriptorProto[]): Map<string, string> {
  return new Map([...runPlugin(protos), ...protos.map(pbModule)]);
}

const load = moduleLoader(project([echoProto(), feedProto()]), {
  'switchboard-rpc': runtime,
  '@bufbuild/protobuf/codegenv1': codegenv1,
  rxjs,
});
const pkg = () => load('demo/demo_pkg_rpc.ts');
const request = { $typeName: 'demo.Input' };

describe('generated code', () => {
  it('type-checks under strict', () => {
    expect(typeCheck(project([echoProto(), feedProto()]))).toEqual([]);
  }, 60_000);

  it('type-checks when messages are named like generated declarations', () => {
    const clash = protoFile({
      name: 'demo/clash.proto',
      package: 'demo',
      messages: ['EchoClient', 'EchoServer', 'EchoServiceDesc', 'Demo'],
      services: [
        {
          name: 'Echo',
          methods: [
            { name: 'Say', input: '.demo.EchoClient', output: '.demo.EchoServer' },
            { name: 'Tail', input: '.demo.EchoServiceDesc', output: '.demo.Demo', serverStreaming: true },
          ],
        },
      ],
    });

    expect(typeCheck(project([clash]))).toEqual([]);
  }, 60_000);

  describe('newDemo', () => {
    it('rejects with the start error and builds no clients', async () => {
      const failure = new Error('connection refused');
      const transport = new LoopbackTransport({ start: failure });

      await expect(invoke(pkg(), 'newDemo', transport)).rejects.toBe(failure);
      expect(transport.scopes).toEqual([{ scope: 'demo', options: undefined }]);
      expect(transport.calls).toEqual([]);
    });

    it('builds every client over one connection', async () => {
      const transport = new LoopbackTransport();
      const demo = await invoke(pkg(), 'newDemo', transport, { endpoint: 'loopback' });
      const reply = await invoke(member(demo, 'echoClient'), 'say', request, { timeoutMs: 5 });

      await invoke(member(demo, 'feedClient'), 'get', { $typeName: 'demo.Query' });

      expect(member(reply, '$typeName')).toBe('demo.Output');
      expect(transport.scopes).toEqual([{ scope: 'demo', options: { endpoint: 'loopback' } }]);
      expect(transport.calls).toEqual([
        { service: 'Echo', method: 'Say', request, options: { timeoutMs: 5 }, output: 'demo.Output' },
        { service: 'Feed', method: 'Get', request: { $typeName: 'demo.Query' }, options: undefined, output: 'demo.Update' },
      ]);
    });

    it('hands call rejections to the caller unchanged', async () => {
      const failure = new Error('deadline exceeded');
      const transport = new LoopbackTransport({ call: failure });
      const demo = await invoke(pkg(), 'newDemo', transport);

      await expect(invoke(member(demo, 'echoClient'), 'say', request)).rejects.toBe(failure);
      expect(transport.calls.map((call) => call.method)).toEqual(['Say']);
    });

    it('opens streams without a request for client streaming', async () => {
      const transport = new LoopbackTransport();
      const feed = member(await invoke(pkg(), 'newDemo', transport), 'feedClient');
      const query = { $typeName: 'demo.Query' };

      invoke(feed, 'watch', query);
      invoke(feed, 'upload');

      expect(transport.streams).toEqual([
        { service: 'Feed', method: 'Watch', request: query },
        { service: 'Feed', method: 'Upload', request: undefined },
      ]);
    });
  });

  it('opens a dedicated connection per client factory', async () => {
    const transport = new LoopbackTransport();

    await invoke(load('demo/echo_rpc.ts'), 'newEchoClient', transport);
    await invoke(load('demo/feed_rpc.ts'), 'newFeedClient', transport);

    expect(transport.scopes.map(({ scope }) => scope)).toEqual(['demo', 'demo']);
  });

  it('prepares the package server before services register', () => {
    const registrar = new RecordingRegistrar();
    const echoServer = { say: () => ({ $typeName: 'demo.Output' }) };

    invoke(pkg(), 'initDemoServer', registrar, { endpoint: '127.0.0.1:0' });
    invoke(load('demo/echo_rpc.ts'), 'registerEchoServer', registrar, echoServer);
    invoke(load('demo/feed_rpc.ts'), 'registerFeedServer', registrar, {});

    expect(member(pkg(), 'DemoServerName')).toBe('demo');
    expect(registrar.events).toEqual(['init demo: Echo, Feed', 'service Echo: Say', 'service Feed: Get']);
    expect(registrar.serveOptions).toEqual([{ endpoint: '127.0.0.1:0' }]);
    expect(registrar.implementations.get('Echo')).toBe(echoServer);
  });
});
