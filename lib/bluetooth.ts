/**
 * Minimal GATT client capability needed to talk to a thermostat.
 */
export interface IGattTransport {
  /**
   * Scans for peripherals for the given time.
   * @returns Addresses of every peripheral seen.
   */
  scan(duration: number): Promise<Array<string>>;
  connect(address: string): Promise<IGattConnection>;
}

export interface IGattConnection {
  readonly address: string;

  read(uuid: string): Promise<Buffer>;
  write(uuid: string, data: Buffer): Promise<void>;
  disconnect(): Promise<void>;
}
