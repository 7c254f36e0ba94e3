import { SpringTicker } from "@/features/springs/SpringTicker";

describe("SpringTicker", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("calls update on every interval until stopped", () => {
    const update = jest.fn();
    const ticker = new SpringTicker({ update }, { interval: 10 });

    ticker.start();
    expect(ticker.running).toBe(true);
    jest.advanceTimersByTime(35);
    expect(update).toHaveBeenCalledTimes(3);

    ticker.stop();
    expect(ticker.running).toBe(false);
    jest.advanceTimersByTime(100);
    expect(update).toHaveBeenCalledTimes(3);
  });

  it("never passes a dt above maxDelta", () => {
    const deltas: number[] = [];
    const ticker = new SpringTicker({ update: (dt) => deltas.push(dt) }, { interval: 10, maxDelta: 0.005 });

    ticker.start();
    jest.advanceTimersByTime(50);
    ticker.stop();

    expect(deltas).toHaveLength(5);
    for (const dt of deltas) {
      expect(dt).toBeGreaterThanOrEqual(0);
      expect(dt).toBeLessThanOrEqual(0.005);
    }
  });

  it("ignores a second start", () => {
    const update = jest.fn();
    const ticker = new SpringTicker({ update }, { interval: 10 });

    ticker.start();
    ticker.start();
    jest.advanceTimersByTime(10);
    ticker.stop();

    expect(update).toHaveBeenCalledTimes(1);
  });
});
