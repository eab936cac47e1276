export * from './protocol/constants';
export * from './protocol/errors';
export * from './protocol/value';
export { byteWidth, buildRecord, buildMarker, buildPayload } from './protocol/payload';
export { buildHeader, headerSize } from './protocol/header';
export { assemblePacket, writePacket } from './protocol/packet';
export type { AssembledPacket, DatagramTransport } from './protocol/packet';
export { defaultCookieSource, sequenceCookieSource } from './protocol/cookie';
export type { CookieSource } from './protocol/cookie';
export { parseHeader, parseRecords, parsePacket } from './protocol/decoder';
export type { ParsedHeader, ParsedPacket } from './protocol/decoder';
export { BinRpcClientCodec } from './client/codec';
export { UdpTransport } from './client/udp-transport';
export { invoke } from './client/invoke';
export type { InvokeOptions } from './client/invoke';
export { BinRpcClient } from './client/client';
export type { BinRpcClientOptions } from './client/client';
export { InvokeTelemetry } from './client/telemetry';
export { registerTelemetryProvider, unregisterTelemetryProvider, renderMetrics } from './client/metrics';
export * from './client/types';
export { BinRpcConfig } from './utils/config';
export type { BinRpcConfigState } from './utils/config';
