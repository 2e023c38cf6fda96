import { describe, it, expect } from 'vitest';
import { InvalidPlanError } from '../services/interview/errors';
import { QuestionPlan, validatePlanInput } from '../services/interview/QuestionPlan';
import { ITEM_DEFAULTS, MINUTE } from './fakes';

function threeItems(): QuestionPlan {
  return QuestionPlan.fromInput(
    [
      { id: 'a', topic: 'Caching', question: 'How do you invalidate a cache?' },
      { id: 'b', topic: 'Testing' },
      { id: 'c', topic: 'Queues', question: 'Tell me about retries.', generate: true },
    ],
    ITEM_DEFAULTS
  );
}

describe('QuestionPlan', () => {
  it('fills defaults and picks the prompt kind', () => {
    const [a, b, c] = threeItems().snapshot();

    expect(a).toMatchObject({
      prompt: { kind: 'text', text: 'How do you invalidate a cache?' },
      minMs: 3 * MINUTE,
      targetMs: 8 * MINUTE,
      maxMs: 12 * MINUTE,
      weight: 1,
      status: 'pending',
    });
    expect(b.prompt).toEqual({ kind: 'generated', topic: 'Testing', hint: undefined });
    expect(c.prompt).toEqual({ kind: 'generated', topic: 'Queues', hint: 'Tell me about retries.' });
  });

  it('clamps the target into the item bounds', () => {
    const plan = QuestionPlan.fromInput([{ id: 'a', topic: 'Caching', targetMs: 20 * MINUTE }], ITEM_DEFAULTS);
    expect(plan.get('a')?.targetMs).toBe(12 * MINUTE);
  });

  it('assigns ids when the payload has none', () => {
    const plan = QuestionPlan.fromInput([{ topic: 'Caching' }, { topic: 'Testing' }], ITEM_DEFAULTS);
    const ids = plan.snapshot().map((i) => i.id);
    expect(new Set(ids).size).toBe(2);
  });

  it('rejects an empty plan', () => {
    expect(() => QuestionPlan.fromInput([], ITEM_DEFAULTS)).toThrow(InvalidPlanError);
  });

  it('collects every problem with the input', () => {
    const issues = validatePlanInput(
      [
        { id: 'a', topic: 'Caching', minMs: 5 * MINUTE, maxMs: MINUTE },
        { id: 'a', topic: ' ' },
        { topic: 'Queues', weight: -1 },
      ],
      ITEM_DEFAULTS
    );

    expect(issues).toEqual([
      'item "a" minimum (300000ms) exceeds maximum (60000ms)',
      'item "a" has no topic',
      'duplicate item id "a"',
      'item #3 has a negative weight',
    ]);
  });

  it('lists the issues on the thrown error', () => {
    try {
      QuestionPlan.fromInput([{ id: 'a', topic: 'Caching', minMs: 2 * MINUTE, maxMs: MINUTE }], ITEM_DEFAULTS);
      expect.unreachable('fromInput should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPlanError);
      if (error instanceof InvalidPlanError) {
        expect(error.issues).toEqual(['item "a" minimum (120000ms) exceeds maximum (60000ms)']);
        expect(error.code).toBe('INVALID_PLAN');
      }
    }
  });

  it('activates items one at a time in order', () => {
    const plan = threeItems();

    expect(plan.activateNext()?.id).toBe('a');
    expect(() => plan.activateNext()).toThrow('another is active');
    plan.finishActive('answered');
    expect(plan.activateNext()?.id).toBe('b');
    plan.finishActive('skipped');

    expect(plan.idsWithStatus('answered')).toEqual(['a']);
    expect(plan.idsWithStatus('skipped')).toEqual(['b']);
    expect(plan.pending().map((i) => i.id)).toEqual(['c']);
  });

  it('only skips or removes pending items', () => {
    const plan = threeItems();
    plan.activateNext();

    expect(plan.skip('a')).toBe(false);
    expect(plan.remove('a')).toBe(false);
    expect(plan.skip('b')).toBe(true);
    expect(plan.remove('c')).toBe(true);
    expect(plan.skip('missing')).toBe(false);
    expect(plan.size()).toBe(2);
    expect(plan.hasPending()).toBe(false);
  });

  it('reorders pending items around started ones', () => {
    const plan = threeItems();
    plan.append({ ...plan.snapshot()[0], id: 'd', topic: 'Logging' });
    plan.activateNext();

    plan.reorder(['d', 'c']);
    expect(plan.snapshot().map((i) => i.id)).toEqual(['a', 'd', 'c', 'b']);
  });

  it('refuses duplicate ids on append', () => {
    const plan = threeItems();
    expect(() => plan.append(plan.snapshot()[1])).toThrow('already contains item "b"');
  });

  it('updates targets of pending items only, within bounds', () => {
    const plan = threeItems();
    plan.activateNext();

    plan.setTargets(
      new Map([
        ['a', 5 * MINUTE],
        ['b', 30 * MINUTE],
        ['c', MINUTE],
      ])
    );
    expect(plan.snapshot().map((i) => i.targetMs)).toEqual([8 * MINUTE, 12 * MINUTE, 3 * MINUTE]);
  });

  it('hands out copies', () => {
    const plan = threeItems();
    const snapshot = plan.snapshot();
    snapshot[0].status = 'answered';

    expect(plan.get('a')?.status).toBe('pending');
  });
});
