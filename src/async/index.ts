export {
	createEventChannel,
	DEFAULT_CHANNEL_CAPACITY,
	type EventChannel,
	type EventChannelOptions,
} from "./event-channel";
export { type PollUntilOptions, pollUntil } from "./poll-until";
