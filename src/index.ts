export { createClient, createClientEffect } from '@core/factory';
export { ConnectionService, createConnectionLayer, normalizeClientOptions } from '@core/services';
export type { MemcacheEnv } from '@core/services';
export { MemcacheRuntime } from '@core/runtime';
export { Operation } from '@core/operations';
export type {
  CasToken,
  CasValue,
  ClientOptions,
  ConnectionState,
  Connector,
  CounterDelta,
  Deserializer,
  Endpoint,
  FlushAllOptions,
  MemcacheClient,
  MemcacheClientEffect,
  MemcacheErrorCode,
  MemcacheErrorContext,
  NoreplyOptions,
  RetrievalOptions,
  SerializedValue,
  Serializer,
  StatValue,
  StoreOptions,
} from '@core/types';
export {
  ClientError,
  IllegalInputError,
  ServerError,
  TimeoutError,
  TransportError,
  UnexpectedCloseError,
  UnknownCommandError,
  UnknownError,
  formatMemcacheError,
  isCacheFailure,
  isIllegalInputError,
  isMemcacheError,
  matchMemcacheError,
} from '@core/errors';
export type { MemcacheError, MemcacheErrorMatcher, ReplyError, StreamError } from '@core/errors';
export { DEFAULT_CONNECT_TIMEOUT, DEFAULT_HOST, DEFAULT_NOREPLY, DEFAULT_PORT, DEFAULT_TIMEOUT } from '@core/defaults';
export { KeyBuilder } from '@core/key-builder';
export { MAX_KEY_LENGTH, keyIssue } from '@core/validation';
export { encode } from '@protocol/encoder';
export type { Command, StorageVerb } from '@protocol/encoder';
export { decodeLine } from '@protocol/decoder';
export type { Reply, ReplyType } from '@protocol/decoder';
export { netConnector } from '@transport/net-connector';
export { parseServer } from '@transport/endpoint';
