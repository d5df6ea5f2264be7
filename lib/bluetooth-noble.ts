import * as noble from "@abandonware/noble";
import { IGattConnection, IGattTransport } from "./bluetooth";
import { DeviceError } from "./errors";
import { normalizeAddress, sleepAsync, toShortUuid } from "./utils";

function addressOf(peripheral: noble.Peripheral) {
  // Some platforms (macOS) hide the address, noble's UUID is all we get there.
  return normalizeAddress(peripheral.address?.length ? peripheral.address : peripheral.uuid);
}

class NobleGattConnection implements IGattConnection {
  constructor(
    private readonly peripheral: noble.Peripheral,
    private readonly characteristics: Map<string, noble.Characteristic>
  ) {}

  public get address() {
    return addressOf(this.peripheral);
  }

  private find(uuid: string) {
    const characteristic = this.characteristics.get(toShortUuid(uuid));
    if (!characteristic) {
      throw new DeviceError(this.address, `Device does not offer characteristic ${uuid}`);
    }
    return characteristic;
  }

  public read(uuid: string): Promise<Buffer> {
    return this.find(uuid).readAsync();
  }

  public write(uuid: string, data: Buffer): Promise<void> {
    return this.find(uuid).writeAsync(data, false);
  }

  public disconnect(): Promise<void> {
    return this.peripheral.disconnectAsync();
  }
}

export default class NobleBluetoothTransport implements IGattTransport {
  private readonly discovered = new Map<string, noble.Peripheral>();

  private constructor(private readonly scanTimeout: number) {}

  public async scan(duration: number): Promise<Array<string>> {
    noble.removeAllListeners("discover");
    noble.on("discover", (peripheral: noble.Peripheral) => {
      this.discovered.set(addressOf(peripheral), peripheral);
    });

    await noble.startScanningAsync([], false);
    await sleepAsync(duration);
    await noble.stopScanningAsync();
    noble.removeAllListeners("discover");

    return [...this.discovered.keys()];
  }

  private async find(address: string): Promise<noble.Peripheral> {
    const known = this.discovered.get(address);
    if (known) {
      return known;
    }

    await this.scan(this.scanTimeout);
    const peripheral = this.discovered.get(address);
    if (!peripheral) {
      throw new DeviceError(address, "Device not found");
    }
    return peripheral;
  }

  public async connect(address: string): Promise<IGattConnection> {
    const peripheral = await this.find(normalizeAddress(address));
    await peripheral.connectAsync();

    const { characteristics } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
    return new NobleGattConnection(
      peripheral,
      new Map(characteristics.map((characteristic) => [characteristic.uuid, characteristic]))
    );
  }

  /**
   * Waits for the adapter to power on.
   * @param scanTimeout How long `connect` scans for an unknown address.
   */
  public static create(scanTimeout = 10 * 1000): Promise<NobleBluetoothTransport> {
    return new Promise((resolve, reject) => {
      noble.on("stateChange", (state: string) => {
        if (state === "unsupported") {
          reject(new Error("Bluetooth is not supported by the host"));
        } else if (state === "poweredOn") {
          resolve(new NobleBluetoothTransport(scanTimeout));
        }
      });
    });
  }
}
