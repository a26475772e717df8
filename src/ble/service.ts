import type {
	CharacteristicDefinition,
	DescriptorDefinition,
	ServiceDescriptor,
} from "../types";
import { toFullUuid } from "../utils";

export const TOGGLE_SERVICE_UUID = toFullUuid(0x1234);
/** The toggle characteristic: read, write and notify */
export const TOGGLE_CHARACTERISTIC_UUID = toFullUuid(0x2a3d);
export const TOGGLE_DESCRIPTOR_UUID = toFullUuid(0x2a13);
export const AUXILIARY_CHARACTERISTIC_UUID = toFullUuid(0x1209);

export const TOGGLE_DESCRIPTOR_VALUE: readonly number[] = [0x00, 0x01];

function freezeDescriptor(descriptor: DescriptorDefinition): DescriptorDefinition {
	return Object.freeze({ ...descriptor });
}

function freezeCharacteristic(
	characteristic: CharacteristicDefinition,
): CharacteristicDefinition {
	return Object.freeze({
		...characteristic,
		properties: Object.freeze([...characteristic.properties]),
		permissions: Object.freeze([...characteristic.permissions]),
		descriptors: Object.freeze(characteristic.descriptors.map(freezeDescriptor)),
	});
}

/**
 * Builds the toggle service: one primary service holding the toggle
 * characteristic (with its two-byte descriptor) and an auxiliary
 * characteristic left at defaults.
 *
 * The result and its nested arrays are frozen. Byte values are fresh copies
 * per call.
 */
export function createToggleService(): ServiceDescriptor {
	const toggle: CharacteristicDefinition = {
		uuid: TOGGLE_CHARACTERISTIC_UUID,
		properties: ["read", "write", "notify"],
		permissions: ["readable", "writeable"],
		descriptors: [
			{
				uuid: TOGGLE_DESCRIPTOR_UUID,
				value: Uint8Array.from(TOGGLE_DESCRIPTOR_VALUE),
			},
		],
	};

	const auxiliary: CharacteristicDefinition = {
		uuid: AUXILIARY_CHARACTERISTIC_UUID,
		properties: [],
		permissions: [],
		descriptors: [],
	};

	return Object.freeze({
		uuid: TOGGLE_SERVICE_UUID,
		primary: true,
		characteristics: Object.freeze([
			freezeCharacteristic(toggle),
			freezeCharacteristic(auxiliary),
		]),
	});
}
