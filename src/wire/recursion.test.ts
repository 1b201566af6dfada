// src/wire/recursion.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RecursionDepth } from './recursion.ts';
import type { DepthLimited } from './recursion.ts';
import type { WireErrorInfo } from './types.ts';

function limitedCoder(maxDepth: number): DepthLimited & { errors: WireErrorInfo[] } {
  const errors: WireErrorInfo[] = [];
  return {
    maxDepth,
    errors,
    setError(code, message) {
      errors.push({ code, message });
    },
  };
}

describe('RecursionDepth', () => {
  it('counts up to the limit and stays valid there', () => {
    const coder = limitedCoder(2);
    const one = RecursionDepth.initial().add(coder);
    const two = one.add(coder);
    assert.equal(one.depth, 1);
    assert.equal(two.depth, 2);
    assert.equal(two.isValid(), true);
    assert.deepEqual(coder.errors, []);
  });

  it('records the error once and stays invalid past the limit', () => {
    const coder = limitedCoder(2);
    const past = RecursionDepth.initial().add(coder).add(coder).add(coder);
    assert.equal(past.isValid(), false);
    assert.equal(past.add(coder).isValid(), false);
    assert.deepEqual(coder.errors, [{ code: 'RECURSION_DEPTH_EXCEEDED', message: 'recursion depth exceeded' }]);
  });

  it('charges several levels at once', () => {
    const coder = limitedCoder(2);
    assert.equal(RecursionDepth.initial().add(coder, 3).isValid(), false);
    assert.equal(coder.errors.length, 1);
  });

  it('never changes the depth it was called on', () => {
    const coder = limitedCoder(4);
    const root = RecursionDepth.initial();
    root.add(coder);
    assert.equal(root.depth, 0);
  });

  it('unchecked depth ignores the limit', () => {
    const coder = limitedCoder(0);
    const unchecked = RecursionDepth.unchecked();
    let depth = unchecked;
    for (let i = 0; i < 100; i++) depth = depth.add(coder);
    assert.equal(depth, unchecked);
    assert.equal(depth.isValid(), true);
    assert.deepEqual(coder.errors, []);
  });
});
