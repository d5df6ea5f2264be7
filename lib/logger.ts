export default class Logger {
  constructor(private readonly allowVerbose: boolean) {}

  public debug(message: string, ...params: Array<unknown>) {
    console.debug(message, ...params);
  }

  public info(message: string, ...params: Array<unknown>) {
    console.info(message, ...params);
  }

  public warn(message: string, ...params: Array<unknown>) {
    console.warn(message, ...params);
  }

  public error(message: string, ...params: Array<unknown>) {
    console.error(message, ...params);
  }

  public verbose(message: string, ...params: Array<unknown>) {
    if (this.allowVerbose) {
      console.debug(message, ...params);
    }
  }
}
