import type { ChannelType } from "./base.js";
import { EchoChannel } from "./echo.js";
import { InternalBusChannel } from "./internal-bus.js";
import { NullChannel } from "./null.js";

export { Channel, type ChannelContext, type ChannelState, type ChannelType } from "./base.js";
export { FlowControlGate } from "./gate.js";

export const BUILTIN_CHANNEL_TYPES: readonly ChannelType[] = [EchoChannel, NullChannel, InternalBusChannel];

/** Payload tag -> endpoint constructor. Later entries replace earlier ones with the same tag. */
export function createChannelTypes(extra: readonly ChannelType[] = []): Map<string, ChannelType> {
  const types = new Map<string, ChannelType>();
  for (const type of [...BUILTIN_CHANNEL_TYPES, ...extra]) types.set(type.payload, type);
  return types;
}
