import { CharacteristicWrite, planRestore } from "./backup";
import { IGattConnection, IGattTransport } from "./bluetooth";
import {
  BATTERY,
  DATETIME,
  DEVICE_NAME,
  FIRMWARE_REVISION,
  FIRMWARE_REVISION_2,
  FLAGS,
  LCD_TIMER,
  MANUFACTURER_NAME,
  MODEL_NUMBER,
  PIN,
  ReadableCharacteristic,
  SOFTWARE_REVISION,
  TEMPERATURES,
  WritableCharacteristic,
  dayCharacteristic,
  holidayCharacteristic,
} from "./characteristics";
import { dateTimeFromDate } from "./codecs/datetime";
import { HOLIDAY_COUNT } from "./codecs/holiday";
import { DAY_COUNT } from "./constants";
import { DeviceError } from "./errors";
import Logger from "./logger";
import { DateTime, DaySchedule, DeviceSnapshot, Holiday, Temperatures } from "./types";
import { withTimeout } from "./utils";

export type CometBlueOptions = {
  /**
   * PIN written right after connecting. Required for writes and for reading
   * most of the settings.
   */
  pin?: number;
  connectionTimeout: number;
  logger?: Logger;
  verbose?: boolean;
};

export default class CometBlue {
  private connection?: IGattConnection;
  private readonly options: CometBlueOptions;
  private readonly logger?: Logger;

  constructor(
    public readonly address: string,
    private readonly transport: IGattTransport,
    options: Partial<CometBlueOptions> = {}
  ) {
    this.options = {
      connectionTimeout: 10 * 1000,
      logger: new Logger(options.verbose ?? false),
      ...options,
    };
    this.logger = this.options.logger;
  }

  public get connected() {
    return this.connection !== undefined;
  }

  /**
   * Connects to the device and authenticates with the PIN, if one was given.
   */
  public async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    // Fail on an invalid PIN before touching the radio.
    const pin = this.options.pin === undefined ? undefined : PIN.encode(this.options.pin);

    this.logger?.info(`Connecting to ${this.address}...`);
    const pending = this.transport.connect(this.address);
    const connection = await withTimeout(pending, this.options.connectionTimeout, () => {
      // Nobody owns a connection established after the timeout, close it.
      pending
        .then((late) => late.disconnect())
        .catch((error: unknown) => {
          this.logger?.debug(`Late connection to ${this.address} failed: ${String(error)}`);
        });
      return new DeviceError(this.address, "Timed out connecting");
    });
    this.connection = connection;

    if (pin) {
      try {
        await connection.write(PIN.uuid, pin);
      } catch (error) {
        await this.disconnect();
        throw new DeviceError(this.address, `Invalid PIN (${String(error)})`);
      }
    }

    this.logger?.info(`Connected to ${this.address}`);
  }

  /**
   * Closes connection with the device. A failing disconnect is logged and
   * the device is considered disconnected anyway.
   */
  public async disconnect() {
    const connection = this.connection;
    if (!connection) {
      return;
    }

    this.connection = undefined;
    try {
      await connection.disconnect();
      this.logger?.info(`Disconnected from ${this.address}`);
    } catch (error) {
      this.logger?.error(`Failed to disconnect from ${this.address}: ${String(error)}`);
    }
  }

  private requireConnection(requiresPin: boolean) {
    if (!this.connection) {
      throw new DeviceError(this.address, "Not connected");
    }
    if (requiresPin && this.options.pin === undefined) {
      throw new DeviceError(this.address, "PIN required");
    }
    return this.connection;
  }

  /**
   * Reads and decodes a characteristic.
   */
  public async read<T>(characteristic: ReadableCharacteristic<T>): Promise<T> {
    const connection = this.requireConnection(characteristic.requiresPin);

    this.logger?.debug(`Reading ${characteristic.description} from ${this.address}...`);
    let data: Buffer;
    try {
      data = await connection.read(characteristic.uuid);
    } catch (error) {
      throw new DeviceError(
        this.address,
        `Reading ${characteristic.description} failed (${String(error)})`
      );
    }
    this.logger?.verbose(`[${this.address} -> Host]`, data);

    return characteristic.decode(data);
  }

  /**
   * Encodes and writes a characteristic. Encoding errors are thrown before
   * anything is sent.
   */
  public async write<T>(characteristic: WritableCharacteristic<T>, value: T): Promise<void> {
    const connection = this.requireConnection(true);
    await this.send(connection, {
      uuid: characteristic.uuid,
      description: characteristic.description,
      payload: characteristic.encode(value),
    });
  }

  private async send(connection: IGattConnection, write: CharacteristicWrite) {
    this.logger?.debug(`Writing ${write.description} to ${this.address}...`);
    this.logger?.verbose(`[Host -> ${this.address}]`, write.payload);
    try {
      await connection.write(write.uuid, write.payload);
    } catch (error) {
      throw new DeviceError(this.address, `Writing ${write.description} failed (${String(error)})`);
    }
  }

  public getDeviceName() {
    return this.read(DEVICE_NAME);
  }

  public getModelNumber() {
    return this.read(MODEL_NUMBER);
  }

  public getFirmwareRevision() {
    return this.read(FIRMWARE_REVISION);
  }

  public getFirmwareRevision2() {
    return this.read(FIRMWARE_REVISION_2);
  }

  public getSoftwareRevision() {
    return this.read(SOFTWARE_REVISION);
  }

  public getManufacturerName() {
    return this.read(MANUFACTURER_NAME);
  }

  public getDateTime() {
    return this.read(DATETIME);
  }

  public setDateTime(value: DateTime | null) {
    return this.write(DATETIME, value);
  }

  public getFlags() {
    return this.read(FLAGS);
  }

  public setFlags(value: number) {
    return this.write(FLAGS, value);
  }

  public getTemperatures() {
    return this.read(TEMPERATURES);
  }

  /**
   * Fields left out or set to `null` are not changed on the device.
   */
  public setTemperatures(value: Partial<Temperatures>) {
    return this.write(TEMPERATURES, value);
  }

  public getBattery() {
    return this.read(BATTERY);
  }

  public getLcdTimer() {
    return this.read(LCD_TIMER);
  }

  public setLcdTimer(value: number) {
    return this.write(LCD_TIMER, value);
  }

  /**
   * @param day Day of the week, Monday being 0.
   */
  public getDay(day: number) {
    return this.read(dayCharacteristic(day));
  }

  public setDay(day: number, periods: DaySchedule) {
    return this.write(dayCharacteristic(day), periods);
  }

  public async getDays() {
    const days: Array<DaySchedule> = [];
    for (let day = 0; day < DAY_COUNT; day++) {
      days.push(await this.getDay(day));
    }
    return days;
  }

  /**
   * @param index Holiday slot, 1-8.
   */
  public getHoliday(index: number) {
    return this.read(holidayCharacteristic(index));
  }

  public setHoliday(holiday: Holiday) {
    return this.write(holidayCharacteristic(holiday.index), holiday);
  }

  public async getHolidays() {
    const holidays: Array<Holiday> = [];
    for (let index = 1; index <= HOLIDAY_COUNT; index++) {
      holidays.push(await this.getHoliday(index));
    }
    return holidays;
  }

  /**
   * Reads every setting that can be restored later. The clock is left out.
   */
  public async backup(): Promise<DeviceSnapshot> {
    this.logger?.info(`Saving all supported values from ${this.address}...`);

    const snapshot: DeviceSnapshot = {
      temperatures: await this.getTemperatures(),
      lcdTimer: await this.getLcdTimer(),
      days: await this.getDays(),
      holidays: await this.getHolidays(),
    };

    this.logger?.info(`All supported values from ${this.address} saved`);
    return snapshot;
  }

  /**
   * Writes every value present in the snapshot, then sets the clock to the
   * current time. Nothing is written if any value fails to encode.
   */
  public async restore(snapshot: DeviceSnapshot, now: Date = new Date()) {
    const connection = this.requireConnection(true);
    const writes = planRestore(snapshot);
    const clock = DATETIME.encode(dateTimeFromDate(now));

    this.logger?.info(`Restoring ${writes.length} values to ${this.address}...`);
    for (const write of writes) {
      await this.send(connection, write);
    }
    await this.send(connection, {
      uuid: DATETIME.uuid,
      description: DATETIME.description,
      payload: clock,
    });

    this.logger?.info(`Values from backup for ${this.address} successfully restored`);
  }
}
