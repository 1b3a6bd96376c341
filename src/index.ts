export { FieldBusBridge } from './bridge/bridge';
export type { FieldBusBridgeOptions } from './bridge/bridge';
export { ProviderRegistry } from './bridge/provider-registry';
export { TypeMapperRegistry } from './bridge/type-mapper-registry';
export { EchoSuppressor, echoKey } from './bridge/echo-suppressor';
export {
  DatapointInitializer,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_READING_PAUSE_MS
} from './bridge/datapoint-initializer';
export type { DatapointInitializerOptions, DatapointInitializerContext } from './bridge/datapoint-initializer';
export { parseGroupAddress, formatGroupAddress, describeGroupAddress } from './bridge/group-address';
export { TransportFault, DecodeFault, ConfigError, describeError } from './bridge/errors';
export { DatapointKind, createDatapoint, serializeValue } from './bridge/types';
export type {
  Datapoint,
  DomainValue,
  RawPayload,
  Logger,
  BindingProvider,
  TypeMapper,
  FieldBusTransport,
  EventPublisher
} from './bridge/types';

export { ConfiguredBindingProvider, ItemBindingSchema, GroupAddressSchema, parseBindings } from './providers/configured-provider';
export type { ItemBinding, ItemBindingInput } from './providers/configured-provider';
export { MqttApplicationBus, connectApplicationBus, DomainValueSchema } from './mqtt/application-bus';
export type { ApplicationEventSink, MqttApplicationBusOptions } from './mqtt/application-bus';

export { BridgeConfigSchema, loadConfig, parseConfig, readConfigFile } from './config';
export type { BridgeConfig, MqttConfig } from './config';
export { createLogger } from './logging/logger';
export type { LoggerOptions } from './logging/logger';
export { LogComponents } from './logging/components';
export { BridgeService } from './service';
export type { BridgeServiceOptions } from './service';
