export const DEVICE_NAME_UUID = "00002a00-0000-1000-8000-00805f9b34fb";
export const MODEL_NUMBER_UUID = "00002a24-0000-1000-8000-00805f9b34fb";
export const FIRMWARE_REVISION_UUID = "00002a26-0000-1000-8000-00805f9b34fb";
export const SOFTWARE_REVISION_UUID = "00002a28-0000-1000-8000-00805f9b34fb";
export const MANUFACTURER_NAME_UUID = "00002a29-0000-1000-8000-00805f9b34fb";

export const DATETIME_UUID = "47e9ee01-47e9-11e4-8939-164230d1df67";
export const DAY_BASE_UUID = "47e9ee10-47e9-11e4-8939-164230d1df67";
export const HOLIDAY_BASE_UUID = "47e9ee20-47e9-11e4-8939-164230d1df67";
export const FLAGS_UUID = "47e9ee2a-47e9-11e4-8939-164230d1df67";
export const TEMPERATURES_UUID = "47e9ee2b-47e9-11e4-8939-164230d1df67";
export const BATTERY_UUID = "47e9ee2c-47e9-11e4-8939-164230d1df67";
export const FIRMWARE_REVISION_2_UUID = "47e9ee2d-47e9-11e4-8939-164230d1df67";
export const LCD_TIMER_UUID = "47e9ee2e-47e9-11e4-8939-164230d1df67";
export const PIN_UUID = "47e9ee30-47e9-11e4-8939-164230d1df67";

export const DAY_COUNT = 7;

export const SUPPORTED_DEVICES: ReadonlyArray<[manufacturer: string, model: string]> = [
  ["eurotronic gmbh", "comet blue"],
];
