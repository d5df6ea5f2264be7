import { IGattConnection, IGattTransport } from "../../lib/bluetooth";
import Logger from "../../lib/logger";
import { sleepAsync } from "../../lib/utils";

/**
 * In-memory peripheral: characteristics keyed by UUID.
 */
export class FakePeripheral {
  public readonly values = new Map<string, Buffer>();
  public readonly writes: Array<{ uuid: string; data: Buffer }> = [];
  public connected = false;
  public rejectWrites = false;
  public rejectReads = false;
  public rejectDisconnect = false;

  /** Milliseconds before a connection attempt succeeds. */
  public connectDelay = 0;

  constructor(public readonly address: string) {}
}

class FakeConnection implements IGattConnection {
  constructor(private readonly peripheral: FakePeripheral) {}

  public get address() {
    return this.peripheral.address;
  }

  public async read(uuid: string) {
    if (this.peripheral.rejectReads) {
      throw new Error("Read rejected");
    }
    const value = this.peripheral.values.get(uuid);
    if (!value) {
      throw new Error(`No characteristic ${uuid}`);
    }
    return value;
  }

  public async write(uuid: string, data: Buffer) {
    if (this.peripheral.rejectWrites) {
      throw new Error("Write rejected");
    }
    this.peripheral.writes.push({ uuid, data });
    this.peripheral.values.set(uuid, data);
  }

  public async disconnect() {
    if (this.peripheral.rejectDisconnect) {
      throw new Error("disconnect failed");
    }
    this.peripheral.connected = false;
  }
}

export class FakeTransport implements IGattTransport {
  public readonly peripherals = new Map<string, FakePeripheral>();

  public add(address: string) {
    const peripheral = new FakePeripheral(address);
    this.peripherals.set(address, peripheral);
    return peripheral;
  }

  public async scan() {
    return [...this.peripherals.keys()];
  }

  public async connect(address: string) {
    const peripheral = this.peripherals.get(address);
    if (!peripheral) {
      throw new Error(`Unknown device ${address}`);
    }
    if (peripheral.connectDelay > 0) {
      await sleepAsync(peripheral.connectDelay);
    }
    peripheral.connected = true;
    return new FakeConnection(peripheral);
  }
}

/**
 * Logger that prints nothing.
 */
export class SilentLogger extends Logger {
  constructor() {
    super(false);
  }

  public debug() {}
  public info() {}
  public warn() {}
  public error() {}
}
