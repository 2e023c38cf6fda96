/**
 * Time Budget Allocator: spreads the time left before the deadline over the
 * items that have not started yet. Pure: reads a plan snapshot, returns new
 * targets and the items to skip; the state machine applies the result.
 */

import type { BudgetState, PlanItem } from '../../types';

export interface AllocationInput {
  /** Full plan snapshot; only pending items are allocated, the active one is reserved for. */
  plan: PlanItem[];
  now: number;
  deadlineAt: number;
  /** Time already spent on the active item, if any. */
  activeElapsedMs?: number;
}

export interface AllocationResult {
  targets: Map<string, number>;
  /** Pending items dropped because their minimums could not fit. */
  skippedItemIds: string[];
  budgetExhausted: boolean;
  budget: BudgetState;
}

export class BudgetAllocator {
  /** Remaining time and floors as seen at `now`, without redistributing anything. */
  snapshot(input: AllocationInput): BudgetState {
    const pending = input.plan.filter((i) => i.status === 'pending');
    return {
      remainingTotalMs: Math.max(0, input.deadlineAt - input.now),
      remainingItemCount: pending.length,
      pendingFloorMs: pending.reduce((sum, i) => sum + i.minMs, 0),
    };
  }

  allocate(input: AllocationInput): AllocationResult {
    const remainingMs = Math.max(0, input.deadlineAt - input.now);
    const active = input.plan.find((i) => i.status === 'active');
    const activeReserve = active ? Math.max(0, active.minMs - (input.activeElapsedMs ?? 0)) : 0;
    const available = Math.max(0, remainingMs - activeReserve);

    let pending = input.plan.filter((i) => i.status === 'pending');
    const skippedItemIds: string[] = [];

    // Drop the cheapest-to-lose items until the minimums fit. Lowest weight
    // goes first; on equal weight the later item in the plan goes first.
    while (pending.length > 0 && this.floor(pending) > available) {
      let victimIndex = 0;
      for (let i = 1; i < pending.length; i++) {
        if (pending[i].weight <= pending[victimIndex].weight) victimIndex = i;
      }
      skippedItemIds.push(pending[victimIndex].id);
      pending = pending.filter((_, i) => i !== victimIndex);
    }

    const floorMs = this.floor(pending);
    const targets = this.distribute(pending, available - floorMs);

    return {
      targets,
      skippedItemIds,
      budgetExhausted: skippedItemIds.length > 0,
      budget: {
        remainingTotalMs: remainingMs,
        remainingItemCount: pending.length,
        pendingFloorMs: floorMs,
      },
    };
  }

  private floor(items: PlanItem[]): number {
    return items.reduce((sum, i) => sum + i.minMs, 0);
  }

  /**
   * Weighted water-filling: each item starts at its minimum and receives a
   * weight-proportional share of the slack, capped at its maximum. Whatever a
   * capped item cannot take is shared again among the rest.
   */
  private distribute(items: PlanItem[], slackMs: number): Map<string, number> {
    const targets = new Map<string, number>(items.map((i) => [i.id, i.minMs]));
    let slack = Math.max(0, slackMs);
    let open = items.filter((i) => i.maxMs > i.minMs);

    while (slack > 0 && open.length > 0) {
      const totalWeight = open.reduce((sum, i) => sum + i.weight, 0);
      const shareOf = (item: PlanItem): number =>
        totalWeight > 0 ? (slack * item.weight) / totalWeight : slack / open.length;

      const capped = open.filter((i) => shareOf(i) >= i.maxMs - (targets.get(i.id) ?? i.minMs));
      if (capped.length === 0) {
        for (const item of open) {
          targets.set(item.id, Math.floor((targets.get(item.id) ?? item.minMs) + shareOf(item)));
        }
        break;
      }
      for (const item of capped) {
        slack -= item.maxMs - (targets.get(item.id) ?? item.minMs);
        targets.set(item.id, item.maxMs);
      }
      open = open.filter((i) => !capped.includes(i));
    }
    return targets;
  }
}

export const budgetAllocator = new BudgetAllocator();
