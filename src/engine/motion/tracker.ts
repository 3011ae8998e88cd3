import type { BoundingBox, Point } from "../../shared/types/detection";

/** Key shared by faces that did not resolve to a known identity. */
export const UNIDENTIFIED_MOTION_KEY = "__unidentified__";

type TrackedMotion = {
  lastCenter: Point;
  cumulative: number;
};

export const boundingBoxCenter = (box: BoundingBox): Point => ({
  x: Math.floor((box.left + box.right) / 2),
  y: Math.floor((box.top + box.bottom) / 2),
});

export const distanceBetween = (a: Point, b: Point): number => {
  return Math.hypot(a.x - b.x, a.y - b.y);
};

export class MotionTracker {
  private readonly tracked = new Map<string, TrackedMotion>();

  /**
   * Records `center` as the latest position for `key` and returns the
   * displacement from the previous one (0 on first sight).
   */
  update(key: string, center: Point): number {
    const previous = this.tracked.get(key);
    const nextCenter = { x: center.x, y: center.y };

    if (!previous) {
      this.tracked.set(key, { lastCenter: nextCenter, cumulative: 0 });
      return 0;
    }

    const delta = distanceBetween(previous.lastCenter, nextCenter);
    previous.lastCenter = nextCenter;
    previous.cumulative += delta;
    return delta;
  }

  lastCenter(key: string): Point | null {
    const tracked = this.tracked.get(key);
    return tracked ? { ...tracked.lastCenter } : null;
  }

  /** Total displacement recorded for `key` since it was first seen. */
  cumulative(key: string): number {
    return this.tracked.get(key)?.cumulative ?? 0;
  }

  forget(key: string): void {
    this.tracked.delete(key);
  }

  reset(): void {
    this.tracked.clear();
  }
}
