import type { PenaltyRecord } from "@readyscore/core";
import { PENALTY_CATEGORY_ORDER } from "../config.js";

export interface PenaltyCollector {
  record(penalty: PenaltyRecord | undefined): void;
  recordAll(penalties: readonly PenaltyRecord[]): void;
  build(): readonly PenaltyRecord[];
}

class OrderedPenaltyCollector implements PenaltyCollector {
  private readonly penalties: PenaltyRecord[] = [];

  record(penalty: PenaltyRecord | undefined): void {
    // Zero-point penalties carry no signal.
    if (penalty === undefined || penalty.points === 0) {
      return;
    }

    this.penalties.push(Object.freeze({ ...penalty }));
  }

  recordAll(penalties: readonly PenaltyRecord[]): void {
    for (const penalty of penalties) {
      this.record(penalty);
    }
  }

  // Stable: records of one category keep the order they were recorded in.
  build(): readonly PenaltyRecord[] {
    return [...this.penalties].sort(
      (a, b) => PENALTY_CATEGORY_ORDER.indexOf(a.category) - PENALTY_CATEGORY_ORDER.indexOf(b.category),
    );
  }
}

export const createPenaltyCollector = (): PenaltyCollector => new OrderedPenaltyCollector();
