import * as THREE from "three";
import { LinearSpring } from "@/lib/physics/LinearSpring";
import { numberAdapter, vector2Adapter } from "@/lib/values/linearAdapters";

const DT = 1 / 60;

function runUntilAsleep(spring: LinearSpring<number>, maxTicks = 10000) {
  const trajectory: number[] = [];
  while (!spring.canSleep() && trajectory.length < maxTicks) {
    trajectory.push(spring.step(DT));
  }
  return trajectory;
}

describe("LinearSpring", () => {
  it("approaches the goal monotonically without overshoot when critically damped", () => {
    const spring = new LinearSpring(1, 4, 0, 1, numberAdapter);
    const trajectory = runUntilAsleep(spring);

    expect(trajectory.length).toBeGreaterThan(0);
    expect(trajectory.length).toBeLessThanOrEqual(60);
    for (let i = 1; i < trajectory.length; i++) {
      expect(trajectory[i]).toBeGreaterThan(trajectory[i - 1]);
    }
    expect(Math.max(...trajectory)).toBeLessThanOrEqual(1);
    expect(spring.canSleep()).toBe(true);
  });

  it("overshoots the goal when underdamped", () => {
    const spring = new LinearSpring(0.6, 1, 0, 1, numberAdapter);
    const trajectory = runUntilAsleep(spring);

    expect(Math.max(...trajectory)).toBeGreaterThan(1);
    expect(spring.canSleep()).toBe(true);
  });

  it("eventually sleeps for any positive damping and frequency", () => {
    for (const d of [0.05, 0.3, 0.6, 0.99, 1, 1.01, 2, 5]) {
      for (const f of [0.5, 1, 4, 10]) {
        const spring = new LinearSpring(d, f, 0, 1, numberAdapter);
        runUntilAsleep(spring);
        expect(spring.canSleep()).toBe(true);
      }
    }
  });

  it("stays finite near the damping boundary and at vanishing frequency", () => {
    for (const [d, f] of [
      [1 - 1e-7, 4],
      [1 + 1e-7, 4],
      [0.5, 1e-9],
      [2, 0],
    ]) {
      const spring = new LinearSpring(d, f, 0, 1, numberAdapter);
      for (let i = 0; i < 120; i++) {
        expect(Number.isFinite(spring.step(DT))).toBe(true);
      }
    }
  });

  it("starts at rest", () => {
    const spring = new LinearSpring(1, 2, new THREE.Vector2(1, 2), new THREE.Vector2(3, 4), vector2Adapter);
    expect(spring.position).toEqual([1, 2]);
    expect(spring.velocity).toEqual([0, 0]);
  });

  it("treats repeated setGoal calls as one", () => {
    const once = new LinearSpring(0.7, 2, 0, 1, numberAdapter);
    const twice = new LinearSpring(0.7, 2, 0, 1, numberAdapter);
    once.step(DT);
    twice.step(DT);

    once.setGoal(5);
    twice.setGoal(5);
    twice.setGoal(5);

    for (let i = 0; i < 30; i++) {
      expect(twice.step(DT)).toBe(once.step(DT));
    }
    expect(twice.goal).toBe(5);
  });

  it("keeps velocity when the goal changes mid-flight", () => {
    const spring = new LinearSpring(1, 2, 0, 1, numberAdapter);
    for (let i = 0; i < 10; i++) spring.step(DT);

    const velocity = [...spring.velocity];
    const position = spring.position[0];
    spring.setGoal(2);

    expect(spring.velocity).toEqual(velocity);
    expect(spring.step(DT)).toBeGreaterThan(position);
  });

  it("applies damping ratio and frequency changes on the next step", () => {
    const spring = new LinearSpring(1, 1, 0, 1, numberAdapter);
    spring.setFrequency(0);
    expect(spring.step(DT)).toBe(0);

    spring.setFrequency(4);
    spring.setDampingRatio(0.5);
    expect(spring.step(DT)).toBeGreaterThan(0);
  });

  it("moves every coordinate independently", () => {
    const spring = new LinearSpring(1, 2, new THREE.Vector2(0, 5), new THREE.Vector2(1, 5), vector2Adapter);
    const next = spring.step(DT);
    expect(next.x).toBeGreaterThan(0);
    expect(next.y).toBe(5);
  });

  it("holds its own copy of the goal", () => {
    const goal = new THREE.Vector2(1, 2);
    const spring = new LinearSpring(1, 2, new THREE.Vector2(), goal, vector2Adapter);

    goal.set(50, 50);
    expect(spring.goal.toArray()).toEqual([1, 2]);

    const next = new THREE.Vector2(3, 4);
    spring.setGoal(next);
    next.set(-1, -1);
    expect(spring.goal.toArray()).toEqual([3, 4]);
  });
});
