export function sleepAsync(time: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, time));
}

/**
 * Rejects with the error returned by `onTimeout` unless `promise` settles
 * within `timeout` milliseconds.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeout: number,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const id = setTimeout(() => reject(onTimeout()), timeout);
    promise.then(resolve, reject).finally(() => {
      clearTimeout(id);
    });
  });
}

const BLUETOOTH_BASE_UUID_SUFFIX = "-0000-1000-8000-00805f9b34fb";

/**
 * Converts a full UUID into the compact form used by noble: 16-bit form for
 * UUIDs derived from the Bluetooth base UUID, otherwise lowercase without dashes.
 */
export function toShortUuid(uuid: string) {
  const lower = uuid.toLowerCase();
  if (lower.startsWith("0000") && lower.endsWith(BLUETOOTH_BASE_UUID_SUFFIX)) {
    return lower.substring(4, 8);
  }
  return lower.replace(/-/g, "");
}

/**
 * Adds `n` to the first field of a UUID. The device exposes table rows
 * (days, holidays) as consecutive characteristics.
 */
export function offsetUuid(uuid: string, n: number) {
  const first = (parseInt(uuid.substring(0, 8), 16) + n) >>> 0;
  return first.toString(16).padStart(8, "0") + uuid.substring(8);
}

export function normalizeAddress(address: string) {
  return address.toLowerCase().replace(/-/g, ":");
}
