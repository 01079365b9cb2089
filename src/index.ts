export * from './runtime';
export { ConfigurationError, NameCollisionError } from './errors';
export { DEFAULT_RUNTIME_MODULE, protocGenSwitchboard } from './protoc-gen-switchboard-plugin';
export { GENERATED_CODE_VERSION } from './print-service';
