import { getLogLevel, log, setLogLevel } from "../../../src/utils/logger";

describe("logger", () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    jest.restoreAllMocks();
  });

  it("should default to warnings and errors only", () => {
    expect(initialLevel).toBe("warn");
  });

  it("should drop messages below the threshold", () => {
    const info = jest.spyOn(console, "log").mockImplementation(() => {});
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});

    setLogLevel("warn");
    log.info("test", "hidden");
    log.warn("test", "shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\S+ {2}WARN \[test\] shown$/);
  });

  it("should log nothing when silent", () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => {});

    setLogLevel("silent");
    log.error("test", "hidden");

    expect(error).not.toHaveBeenCalled();
  });
});
