export { NEW_RESPONSE_TOKEN, runChannels, signalForStatus } from "./channels";
export {
  type ChannelHandler,
  InMemoryKeyValueStore,
  type InMemoryKeyValueStoreOptions,
  type KeyValueStore,
  type KeyValueSubscription,
} from "./keyValueStore";
export {
  type ControlListener,
  type ControlListenerOptions,
  RunStreamBroker,
  type RunStreamBrokerOptions,
  type StreamHandler,
  type StreamSubscription,
  streamedMessageSchema,
} from "./runStreamBroker";
