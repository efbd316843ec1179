import { describe, it, expect } from 'vitest';
import { CancelToken } from '../src/task/cancel-token.js';

describe('CancelToken', () => {
  it('notifies listeners once with the first reason', () => {
    const token = new CancelToken();
    const seen: string[] = [];
    token.onCancel(() => seen.push(token.reason));
    token.cancel('first');
    token.cancel('second');
    expect(token.canceled).toBe(true);
    expect(token.reason).toBe('first');
    expect(seen).toEqual(['first']);
  });

  it('runs late listeners immediately', () => {
    const token = new CancelToken();
    token.cancel();
    let called = false;
    token.onCancel(() => {
      called = true;
    });
    expect(called).toBe(true);
    expect(token.reason).toBe('Session cancelled');
  });

  it('keeps going when a listener throws', () => {
    const token = new CancelToken();
    let second = false;
    token.onCancel(() => {
      throw new Error('listener failed');
    });
    token.onCancel(() => {
      second = true;
    });
    token.cancel();
    expect(second).toBe(true);
  });
});
