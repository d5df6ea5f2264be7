import NobleBluetoothTransport from "../lib/bluetooth-noble";
import { discover } from "../lib/discovery";
import Logger from "../lib/logger";

NobleBluetoothTransport.create().then(async (bluetooth) => {
  const devices = await discover(bluetooth, { duration: 10 * 1000, logger: new Logger(false) });
  for (const device of devices) {
    console.log(`Found a thermostat @ ${device.address} (${device.modelNumber})`);
  }
  process.exit(0);
}, console.error);
