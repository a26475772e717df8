export {
	type BlenoCharacteristicOptions,
	type BlenoDescriptorOptions,
	type BlenoModule,
	type BlenoPeripheralOptions,
	type BlenoServiceOptions,
	createBlenoPeripheral,
	isBlenoModule,
	loadBleno,
	RESULT_CODES,
} from "./bleno";
export {
	createMemoryPeripheral,
	type MemoryAdvertisement,
	type MemoryNotification,
	type MemoryPeripheral,
	type MemoryPeripheralOptions,
} from "./memory-peripheral";
