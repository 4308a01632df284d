import { getLogLevel, isLogLevel, setLogLevel, setupLogger } from "../shared/logger";

describe("logger", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    setLogLevel("info");
  });

  it("should default to info", () => {
    expect(getLogLevel()).toBe("info");
  });

  it("should prefix messages with timestamp, level and module", () => {
    setupLogger("test").info("hello");

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  \[test\] hello$/
    );
  });

  it("should route warnings and errors to their console streams", () => {
    const logger = setupLogger("store");
    logger.warn("careful");
    logger.error("broken");

    expect(warnSpy.mock.calls[0][0]).toMatch(/ WARN  \[store\] careful$/);
    expect(errorSpy.mock.calls[0][0]).toMatch(/ ERROR \[store\] broken$/);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("should drop messages below the current level", () => {
    const logger = setupLogger("test");
    logger.debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();

    setLogLevel("debug");
    logger.debug("shown");
    expect(logSpy.mock.calls[0][0]).toMatch(/ DEBUG \[test\] shown$/);

    setLogLevel("error");
    logger.warn("hidden too");
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("should recognise level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
