import { ConsoleLogger } from "./logger";

describe("ConsoleLogger", () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should prefix messages", () => {
    const logger = new ConsoleLogger();

    logger.info("ready");
    logger.warn("careful", { attempt: 1 });
    logger.error("failed");

    expect(log).toHaveBeenCalledWith("[HalPay SDK] ready");
    expect(warn).toHaveBeenCalledWith("[HalPay SDK] careful", { attempt: 1 });
    expect(error).toHaveBeenCalledWith("[HalPay SDK] failed");
  });

  it("should drop debug output unless enabled", () => {
    new ConsoleLogger().debug("hidden");
    expect(log).not.toHaveBeenCalled();

    new ConsoleLogger({ debug: true }).debug("GET https://api-sandbox.example.com/");
    expect(log).toHaveBeenCalledWith("[HalPay SDK] [DEBUG] GET https://api-sandbox.example.com/");
  });
});
