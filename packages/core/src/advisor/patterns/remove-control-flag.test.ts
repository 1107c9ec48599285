import { describe, it, expect } from 'vitest';
import { contextOf } from '../../test/helpers/units.js';
import { RemoveControlFlagChecker } from './remove-control-flag.js';

const checker = new RemoveControlFlagChecker();

describe('RemoveControlFlagChecker', () => {
  it('should replace the flag with break and drop it from the loop test', () => {
    const context = contextOf(`
function findFirst(items) {
  let found = false;
  let i = 0;
  while (!found && i < items.length) {
    if (items[i].ready) {
      found = true;
    }
    i++;
  }
  return i;
}
    `.trim());

    const match = checker.check(context);
    if (!match) throw new Error('expected a match');

    expect(match.target).toEqual({ startLine: 4, endLine: 9 });
    expect(match.rationale).toBe('Flag `found` only stops the loop; replace its assignment with `break`');

    const [declaration, loop, result] = match.rewritten.children;
    expect(declaration.text).toBe('let i = 0;');
    expect(result.text).toBe('return i;');
    if (loop.kind !== 'loop') throw new Error('expected loop');
    expect(loop.test?.text).toBe('i < items.length');
    expect(loop.alwaysTrue).toBe(false);

    const [check] = loop.body.children;
    if (check.kind !== 'conditional') throw new Error('expected conditional');
    expect(check.consequent.children.map(s => s.text)).toEqual(['break;']);
  });

  it('should loop forever when the flag was the whole test', () => {
    const context = contextOf(`
function drain(queue) {
  let running = true;
  while (running) {
    if (queue.empty()) running = false;
    queue.pop();
  }
}
    `.trim());

    const match = checker.check(context);
    const [loop] = match?.rewritten.children ?? [];

    expect(loop?.kind === 'loop' && [loop.test, loop.alwaysTrue]).toEqual([null, true]);
  });

  it('should keep the declaration when the next statement reads the flag', () => {
    const context = contextOf(`
function search(items) {
  let hit = false;
  for (let i = 0; !hit && i < items.length; i++) {
    if (items[i]) hit = true;
  }
  return hit;
}
    `.trim());

    const match = checker.check(context);

    expect(match?.rewritten.children.map(s => s.kind)).toEqual(['assign', 'loop', 'jump']);
  });

  it('should reject a flag that is read inside the loop', () => {
    const context = contextOf(`
function scan(items) {
  let done = false;
  while (!done) {
    log(done);
    done = true;
  }
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });

  it('should reject a flag set from an inner loop', () => {
    const context = contextOf(`
function scan(rows) {
  let done = false;
  while (!done) {
    for (const row of rows) {
      if (row) done = true;
    }
  }
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });
});
