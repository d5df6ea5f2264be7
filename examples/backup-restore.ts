import { readFileSync, writeFileSync } from "fs";
import { createBackup, parseBackup, snapshotFromBackup } from "../lib/backup";
import NobleBluetoothTransport from "../lib/bluetooth-noble";
import CometBlue from "../lib/comet-blue";

// Usage: backup-restore <backup|restore> <address> <pin> <file>
const [command, address, pin, fileName] = process.argv.slice(2);

NobleBluetoothTransport.create().then(async (bluetooth) => {
  const device = new CometBlue(address, bluetooth, { pin: Number(pin), verbose: true });

  try {
    await device.connect();

    if (command === "backup") {
      const backup = createBackup(await device.backup());
      writeFileSync(fileName, JSON.stringify(backup, null, 2));
    } else if (command === "restore") {
      const backup = parseBackup(JSON.parse(readFileSync(fileName, "utf8")));
      await device.restore(snapshotFromBackup(backup));
    } else {
      throw new Error(`Unknown command: ${command}`);
    }
  } catch (error) {
    console.error(error);
  } finally {
    await device.disconnect();
    process.exit(0);
  }
}, console.error);
