/**
 * @clinic-relay/session-bridge: hand-off between a connection and its engine.
 */

export {
  SessionBridge,
  type SessionBridgeOptions,
  type BridgeExit,
} from "./session-bridge.js";
export { AsyncChannel } from "./channel.js";
