import * as THREE from "three";

export interface Tickable {
  update(dt: number): void;
}

export interface SpringTickerOptions {
  /** Milliseconds between ticks. */
  interval?: number;
  /** Upper bound on a single dt, in seconds, so a stalled timer can't launch springs. */
  maxDelta?: number;
}

/**
 * Tick source for hosts without a render loop of their own. Hosts that
 * already run one (requestAnimationFrame, a game loop) should call
 * `controller.update(dt)` from there instead.
 */
export class SpringTicker {
  private readonly target: Tickable;
  private readonly clock = new THREE.Clock(false);
  private readonly interval: number;
  private readonly maxDelta: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(target: Tickable, options: SpringTickerOptions = {}) {
    this.target = target;
    this.interval = options.interval ?? 1000 / 60;
    this.maxDelta = options.maxDelta ?? 0.1;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer) return;
    this.clock.start();
    this.timer = setInterval(() => this.tick(), this.interval);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clock.stop();
  }

  /** Advances the target by the time since the previous tick. */
  tick() {
    const dt = Math.min(this.clock.getDelta(), this.maxDelta);
    this.target.update(dt);
  }
}
