export * from "./packet.js";
export * from "./signing.js";
export * from "./client.js";
export * from "./events.js";
export * from "./bus.js";
export * from "./dispatcher.js";
export * from "./socket.js";
export * from "./session.js";
export * from "./manager.js";
export { EventQueue, type OfferResult } from "../shared/channel.js";
export {
  LiveError,
  ConfigError,
  ConnectError,
  ProtocolError,
  ApiError,
  TransportError,
  type LiveErrorCode,
} from "../shared/errors.js";
export { resolveLiveConfig, clampHeartbeatSeconds, type LiveConfig } from "../config.js";
