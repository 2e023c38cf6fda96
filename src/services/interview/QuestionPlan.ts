/**
 * Question Plan: ordered, mutable list of topics/questions with per-item time
 * allocations. Built from the matching subsystem's payload, owned by one
 * session, and only changed by that session's state machine.
 */

import { v4 as uuidv4 } from 'uuid';
import type { PlanItem, PlanItemInput, PlanItemStatus, QuestionPrompt } from '../../types';
import { InvalidPlanError } from './errors';

export interface PlanDefaults {
  minMs: number;
  targetMs: number;
  maxMs: number;
  weight: number;
}

function clamp(value: number, low: number, high: number): number {
  return Math.min(high, Math.max(low, value));
}

function toPrompt(input: PlanItemInput): QuestionPrompt {
  const question = input.question?.trim();
  if (question && !input.generate) return { kind: 'text', text: question };
  return { kind: 'generated', topic: input.topic, hint: input.hint ?? question };
}

/** Collect every problem rather than stopping at the first one. */
export function validatePlanInput(inputs: PlanItemInput[], defaults: PlanDefaults): string[] {
  const issues: string[] = [];
  if (inputs.length === 0) issues.push('plan has no items');

  const seen = new Set<string>();
  inputs.forEach((input, index) => {
    const label = input.id ? `item "${input.id}"` : `item #${index + 1}`;
    if (!input.topic || !input.topic.trim()) issues.push(`${label} has no topic`);
    const minMs = input.minMs ?? defaults.minMs;
    const maxMs = input.maxMs ?? defaults.maxMs;
    if (minMs < 0 || maxMs < 0) issues.push(`${label} has a negative time allocation`);
    if (minMs > maxMs) issues.push(`${label} minimum (${minMs}ms) exceeds maximum (${maxMs}ms)`);
    if ((input.weight ?? defaults.weight) < 0) issues.push(`${label} has a negative weight`);
    if (input.id) {
      if (seen.has(input.id)) issues.push(`duplicate item id "${input.id}"`);
      seen.add(input.id);
    }
  });
  return issues;
}

export class QuestionPlan {
  private items: PlanItem[];

  constructor(items: PlanItem[]) {
    this.items = items.map((item) => ({ ...item }));
  }

  /**
   * Build a plan from raw input, filling defaults. Throws InvalidPlanError
   * when the plan is empty or any item's minimum exceeds its maximum.
   */
  static fromInput(inputs: PlanItemInput[], defaults: PlanDefaults): QuestionPlan {
    const issues = validatePlanInput(inputs, defaults);
    if (issues.length > 0) throw new InvalidPlanError(issues);

    return new QuestionPlan(
      inputs.map((input) => {
        const minMs = input.minMs ?? defaults.minMs;
        const maxMs = input.maxMs ?? defaults.maxMs;
        return {
          id: input.id ?? uuidv4(),
          topic: input.topic.trim(),
          prompt: toPrompt(input),
          rubric: {
            expectedPoints: input.expectedPoints ?? [],
            competencyIds: input.competencyIds ?? [],
          },
          followUpPrompt: input.followUpPrompt,
          minMs,
          targetMs: clamp(input.targetMs ?? defaults.targetMs, minMs, maxMs),
          maxMs,
          weight: input.weight ?? defaults.weight,
          status: 'pending' as const,
        };
      })
    );
  }

  /** Issues with an already-built plan (same rules as fromInput). */
  validate(): string[] {
    const issues: string[] = [];
    if (this.items.length === 0) issues.push('plan has no items');
    const seen = new Set<string>();
    for (const item of this.items) {
      if (item.minMs < 0 || item.maxMs < 0) issues.push(`item "${item.id}" has a negative time allocation`);
      if (item.minMs > item.maxMs) issues.push(`item "${item.id}" minimum (${item.minMs}ms) exceeds maximum (${item.maxMs}ms)`);
      if (item.weight < 0) issues.push(`item "${item.id}" has a negative weight`);
      if (seen.has(item.id)) issues.push(`duplicate item id "${item.id}"`);
      seen.add(item.id);
    }
    return issues;
  }

  /** Copies, so callers can never write through to the plan. */
  snapshot(): PlanItem[] {
    return this.items.map((item) => ({ ...item, rubric: { ...item.rubric } }));
  }

  get(id: string): PlanItem | undefined {
    const item = this.items.find((i) => i.id === id);
    return item ? { ...item } : undefined;
  }

  active(): PlanItem | undefined {
    const item = this.items.find((i) => i.status === 'active');
    return item ? { ...item } : undefined;
  }

  pending(): PlanItem[] {
    return this.items.filter((i) => i.status === 'pending').map((i) => ({ ...i }));
  }

  hasPending(): boolean {
    return this.items.some((i) => i.status === 'pending');
  }

  idsWithStatus(status: PlanItemStatus): string[] {
    return this.items.filter((i) => i.status === status).map((i) => i.id);
  }

  /** Marks the first pending item active. Only one item may be active at a time. */
  activateNext(): PlanItem | undefined {
    if (this.items.some((i) => i.status === 'active')) {
      throw new Error('Cannot activate a plan item while another is active');
    }
    const next = this.items.find((i) => i.status === 'pending');
    if (!next) return undefined;
    next.status = 'active';
    return { ...next };
  }

  /** Closes the active item. */
  finishActive(status: 'answered' | 'skipped'): PlanItem | undefined {
    const item = this.items.find((i) => i.status === 'active');
    if (!item) return undefined;
    item.status = status;
    return { ...item };
  }

  /** Skips a pending item. Active or finished items are left alone. */
  skip(id: string): boolean {
    const item = this.items.find((i) => i.id === id);
    if (!item || item.status !== 'pending') return false;
    item.status = 'skipped';
    return true;
  }

  append(item: PlanItem): void {
    if (this.items.some((i) => i.id === item.id)) {
      throw new Error(`Plan already contains item "${item.id}"`);
    }
    this.items.push({ ...item, status: 'pending' });
  }

  /** Removes a pending item; never removes one mid-delivery. */
  remove(id: string): boolean {
    const index = this.items.findIndex((i) => i.id === id);
    if (index < 0 || this.items[index].status !== 'pending') return false;
    this.items.splice(index, 1);
    return true;
  }

  /**
   * Reorders pending items to follow `pendingIds`; started and finished items
   * keep their positions. Ids not listed keep their relative order at the end.
   */
  reorder(pendingIds: string[]): void {
    const pendingSlots = this.items
      .map((item, index) => ({ item, index }))
      .filter(({ item }) => item.status === 'pending');
    const rank = new Map(pendingIds.map((id, i) => [id, i]));
    const ordered = pendingSlots
      .map(({ item }) => item)
      .sort((a, b) => (rank.get(a.id) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b.id) ?? Number.MAX_SAFE_INTEGER));
    pendingSlots.forEach(({ index }, i) => {
      this.items[index] = ordered[i];
    });
  }

  setTargets(targets: Map<string, number>): void {
    for (const item of this.items) {
      const target = targets.get(item.id);
      if (target !== undefined && item.status === 'pending') {
        item.targetMs = clamp(target, item.minMs, item.maxMs);
      }
    }
  }

  size(): number {
    return this.items.length;
  }
}
