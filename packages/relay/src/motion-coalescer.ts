import type { MotionTransition } from "@camrelay/shared";

export type CoalesceResult = {
  emit?: MotionTransition;
  reason: "transition" | "duplicate" | "seeded";
};

/**
 * Folds per-source motion flags into one camera-level state. "started" is emitted when
 * the first source turns active and "stopped" when the last one turns idle; repeats in
 * between are duplicates.
 */
export class MotionCoalescer {
  private readonly activeSources = new Set<string>();

  get active(): boolean {
    return this.activeSources.size > 0;
  }

  /** Records a source's state without emitting, for synchronization-point snapshots. */
  seed(source: string, active: boolean): CoalesceResult {
    if (active) {
      this.activeSources.add(source);
    } else {
      this.activeSources.delete(source);
    }
    return { reason: "seeded" };
  }

  update(source: string, active: boolean): CoalesceResult {
    const wasActive = this.active;
    if (active) {
      this.activeSources.add(source);
    } else {
      this.activeSources.delete(source);
    }

    if (!wasActive && this.active) {
      return { emit: "started", reason: "transition" };
    }
    if (wasActive && !this.active) {
      return { emit: "stopped", reason: "transition" };
    }
    return { reason: "duplicate" };
  }
}
