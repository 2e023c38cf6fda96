import { describe, it, expect } from 'vitest';
import { BudgetAllocator } from '../services/interview/BudgetAllocator';
import type { PlanItem } from '../types';
import { MINUTE } from './fakes';

function item(id: string, overrides: Partial<PlanItem> = {}): PlanItem {
  return {
    id,
    topic: id,
    prompt: { kind: 'text', text: `Question ${id}` },
    rubric: { expectedPoints: [], competencyIds: [] },
    minMs: 3 * MINUTE,
    targetMs: 8 * MINUTE,
    maxMs: 12 * MINUTE,
    weight: 1,
    status: 'pending',
    ...overrides,
  };
}

const allocator = new BudgetAllocator();

describe('BudgetAllocator', () => {
  it('spreads the slack evenly over equal-weight items', () => {
    const result = allocator.allocate({ plan: [item('a'), item('b'), item('c')], now: 0, deadlineAt: 30 * MINUTE });

    expect([...result.targets.entries()]).toEqual([
      ['a', 10 * MINUTE],
      ['b', 10 * MINUTE],
      ['c', 10 * MINUTE],
    ]);
    expect(result.skippedItemIds).toEqual([]);
    expect(result.budgetExhausted).toBe(false);
    expect(result.budget).toEqual({ remainingTotalMs: 30 * MINUTE, remainingItemCount: 3, pendingFloorMs: 9 * MINUTE });
  });

  it('shares slack in proportion to weight', () => {
    const result = allocator.allocate({
      plan: [item('a', { weight: 2 }), item('b', { weight: 1 })],
      now: 0,
      deadlineAt: 12 * MINUTE,
    });

    expect(result.targets.get('a')).toBe(7 * MINUTE);
    expect(result.targets.get('b')).toBe(5 * MINUTE);
  });

  it('never allocates past an item maximum', () => {
    const result = allocator.allocate({
      plan: [item('a', { weight: 5 }), item('b', { weight: 1 })],
      now: 0,
      deadlineAt: 60 * MINUTE,
    });

    expect(result.targets.get('a')).toBe(12 * MINUTE);
    expect(result.targets.get('b')).toBe(12 * MINUTE);
  });

  it('skips the lowest-weight item first when minimums do not fit', () => {
    const result = allocator.allocate({
      plan: [item('a'), item('b', { weight: 0.5 }), item('c')],
      now: 0,
      deadlineAt: 7 * MINUTE,
    });

    expect(result.skippedItemIds).toEqual(['b']);
    expect(result.budgetExhausted).toBe(true);
    expect(result.targets.get('a')).toBe(3.5 * MINUTE);
    expect(result.targets.get('c')).toBe(3.5 * MINUTE);
    expect(result.targets.has('b')).toBe(false);
  });

  it('skips the later item on equal weight', () => {
    const result = allocator.allocate({ plan: [item('a'), item('b'), item('c')], now: 0, deadlineAt: 7 * MINUTE });
    expect(result.skippedItemIds).toEqual(['c']);
  });

  it('reserves the rest of the active item minimum before allocating', () => {
    const result = allocator.allocate({
      plan: [item('a', { status: 'active' }), item('b'), item('c')],
      now: 0,
      deadlineAt: 10 * MINUTE,
      activeElapsedMs: MINUTE,
    });

    expect(result.targets.has('a')).toBe(false);
    expect(result.targets.get('b')).toBe(4 * MINUTE);
    expect(result.targets.get('c')).toBe(4 * MINUTE);
  });

  it('ignores finished items', () => {
    const result = allocator.allocate({
      plan: [item('a', { status: 'answered' }), item('b', { status: 'skipped' }), item('c')],
      now: 20 * MINUTE,
      deadlineAt: 30 * MINUTE,
    });

    expect([...result.targets.keys()]).toEqual(['c']);
    expect(result.targets.get('c')).toBe(10 * MINUTE);
  });

  it('skips everything pending once the deadline has passed', () => {
    const result = allocator.allocate({ plan: [item('a'), item('b')], now: 31 * MINUTE, deadlineAt: 30 * MINUTE });

    expect(result.skippedItemIds).toEqual(['b', 'a']);
    expect(result.budget.remainingTotalMs).toBe(0);
    expect(result.targets.size).toBe(0);
  });

  it('keeps the sum of targets within the remaining time', () => {
    const plan = [item('a', { weight: 3 }), item('b', { weight: 1, maxMs: 4 * MINUTE }), item('c', { weight: 2 })];
    const result = allocator.allocate({ plan, now: 2 * MINUTE, deadlineAt: 25 * MINUTE });
    const total = [...result.targets.values()].reduce((sum, t) => sum + t, 0);

    expect(total).toBeLessThanOrEqual(23 * MINUTE);
    expect(result.targets.get('b')).toBe(4 * MINUTE);
  });

  it('reports the budget without redistributing', () => {
    expect(allocator.snapshot({ plan: [item('a', { status: 'active' }), item('b')], now: MINUTE, deadlineAt: 10 * MINUTE })).toEqual({
      remainingTotalMs: 9 * MINUTE,
      remainingItemCount: 1,
      pendingFloorMs: 3 * MINUTE,
    });
  });
});
