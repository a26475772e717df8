export { decodeText, encodeText, toBytes } from "./text";

export {
	BLUETOOTH_UUID_BASE,
	toCompactUuid,
	toFullUuid,
	uuidEquals,
} from "./uuid";
