import { logger, type LogEvent } from "@/lib/logger";

describe("logger", () => {
  it("notifies subscribers and buffers events", () => {
    const received: LogEvent[] = [];
    const unsubscribe = logger.subscribe((event) => received.push(event));

    logger.debug("test", "hello", { n: 1 });
    unsubscribe();
    logger.debug("test", "after");

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ level: "debug", tag: "test", message: "hello", data: { n: 1 } });
    const buffer = logger.getBuffer();
    expect(buffer[buffer.length - 1].message).toBe("after");
  });

  it("keeps a bounded buffer", () => {
    for (let i = 0; i < 80; i++) {
      logger.debug("test", `event ${i}`);
    }
    const buffer = logger.getBuffer();
    expect(buffer).toHaveLength(50);
    expect(buffer[49].message).toBe("event 79");
  });

  it("writes to the console at or above the configured level", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    const debug = jest.spyOn(console, "debug").mockImplementation(() => {});

    logger.setConsoleLevel("warn");
    logger.debug("test", "quiet");
    logger.warn("test", "loud");
    logger.setConsoleLevel("info");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/\[warn\] \[test\] loud$/);

    warn.mockRestore();
    debug.mockRestore();
  });
});
