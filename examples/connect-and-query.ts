import NobleBluetoothTransport from "../lib/bluetooth-noble";
import CometBlue from "../lib/comet-blue";
import { formatDateTime } from "../lib/codecs/datetime";
import { formatTimeOfDay } from "../lib/codecs/day-schedule";
import { WEEKDAYS } from "../lib/weekdays";

const [address, pin] = process.argv.slice(2);

NobleBluetoothTransport.create().then(async (bluetooth) => {
  const device = new CometBlue(address, bluetooth, { pin: Number(pin) });

  try {
    await device.connect();

    console.log("manufacturer", await device.getManufacturerName());
    console.log("model", await device.getModelNumber());
    console.log("battery", await device.getBattery());

    const clock = await device.getDateTime();
    console.log("datetime", clock ? formatDateTime(clock) : "unset");

    const temperatures = await device.getTemperatures();
    console.log("currentTemperature", temperatures.current?.toString());
    console.log("manualTemperature", temperatures.manual?.toString());

    const days = await device.getDays();
    days.forEach((periods, day) => {
      const text = periods.map((p) => `${formatTimeOfDay(p.start)}-${formatTimeOfDay(p.end)}`);
      console.log(WEEKDAYS[day], text.join(" "));
    });
  } catch (error) {
    console.error(error);
  } finally {
    await device.disconnect();
    process.exit(0);
  }
}, console.error);
