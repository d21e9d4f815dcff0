export { BridgeSession, type BridgeSessionOptions } from "./session.js";
export { ControlRouter, type RouterContext } from "./router.js";
export { ChannelRegistry } from "./registry.js";
export {
  BUILTIN_CHANNEL_TYPES,
  Channel,
  FlowControlGate,
  createChannelTypes,
  type ChannelContext,
  type ChannelState,
  type ChannelType,
} from "./channels/index.js";
export { InternalBus, BusClient, type BusSend } from "./bus/bus.js";
export { BusObject, method, property, signal, type BusMember, type InterfaceDescriptor } from "./bus/object.js";
export { SuperuserRule, type Prompter } from "./superuser/rule.js";
export { PeerBridge, type PeerHandlers, type PeerState } from "./superuser/peer.js";
export { LoginMessages } from "./login-messages.js";
export { FrameTransport, spawnPeerProcess, type FrameSink, type PeerProcess, type PeerSpawner } from "./transport.js";
export { runStdioBridge, createStdioSession, type StdioBridgeOptions } from "./stdio.js";
export { encodeFrame, encodeControl, FrameDecoder, readFrames, type Frame } from "../protocols/frame/codec.js";
