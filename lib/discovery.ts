import { IGattTransport } from "./bluetooth";
import CometBlue from "./comet-blue";
import { SUPPORTED_DEVICES } from "./constants";
import Logger from "./logger";

export type DiscoveredDevice = {
  address: string;
  manufacturerName: string;
  modelNumber: string;
};

export type DiscoveryOptions = {
  /** Scan duration in milliseconds. */
  duration: number;
  connectionTimeout: number;
  logger?: Logger;
};

function isSupported(manufacturerName: string, modelNumber: string) {
  return SUPPORTED_DEVICES.some(
    ([manufacturer, model]) =>
      manufacturer === manufacturerName.toLowerCase() && model === modelNumber.toLowerCase()
  );
}

/**
 * Scans for peripherals and keeps the ones identifying themselves as a
 * supported thermostat. Peripherals that can't be queried are skipped.
 */
export async function discover(
  transport: IGattTransport,
  options: Partial<DiscoveryOptions> = {}
): Promise<Array<DiscoveredDevice>> {
  const { duration, connectionTimeout, logger }: DiscoveryOptions = {
    duration: 10 * 1000,
    connectionTimeout: 10 * 1000,
    logger: new Logger(false),
    ...options,
  };

  logger?.info(`Starting discovery with ${duration} ms timeout...`);
  const addresses = await transport.scan(duration);
  logger?.debug(`All discovered devices: ${addresses.join(", ")}`);

  const devices: Array<DiscoveredDevice> = [];

  for (const address of addresses) {
    const device = new CometBlue(address, transport, { connectionTimeout, logger });
    try {
      await device.connect();
      const manufacturerName = await device.getManufacturerName();
      const modelNumber = await device.getModelNumber();

      if (isSupported(manufacturerName, modelNumber)) {
        devices.push({ address, manufacturerName, modelNumber });
      }
    } catch (error) {
      logger?.debug(`Skipping ${address}: ${String(error)}`);
    } finally {
      await device.disconnect();
    }
  }

  logger?.info("Discovery finished");
  return devices;
}
