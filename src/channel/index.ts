export { HandleTable } from './handle-table.ts';
export type { KernelObject, WarnSink } from './handle-table.ts';
export {
  CHANNEL_MAX_MSG_BYTES,
  CHANNEL_MAX_MSG_HANDLES,
  ChannelEnd,
  ChannelError,
  createChannelPair,
} from './channel.ts';
export type { ChannelErrorCode, ChannelMessage } from './channel.ts';
export { EPITAPH_STATUS, MessageEndpoint } from './endpoint.ts';
export type { MessageEndpointOptions } from './endpoint.ts';
