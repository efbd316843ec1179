import { describe, it, expect } from 'vitest';
import { ActionExecutor } from '../src/agent/action-executor.js';
import { AgentError } from '../src/agent/errors.js';
import { FakeDevice, makeXml } from './helpers.js';

const screens = () => ({ xml: makeXml([]) });

describe('ActionExecutor', () => {
  it('dispatches each action kind to the device', async () => {
    const device = new FakeDevice(screens);
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    await executor.execute({ kind: 'tap', point: { x: 1, y: 2 } });
    await executor.execute({ kind: 'long_press', point: { x: 3, y: 4 }, durationMs: 1000 });
    await executor.execute({ kind: 'swipe', from: { x: 0, y: 0 }, to: { x: 0, y: 100 }, durationMs: 400 });
    await executor.execute({ kind: 'type_text', text: 'hi', focus: { x: 5, y: 6 } });
    await executor.pressBack();

    expect(device.ops()).toEqual(['tap', 'longPress', 'swipe', 'tap', 'typeText', 'back']);
    expect(device.calls[3]).toEqual({ op: 'tap', point: { x: 5, y: 6 } });
  });

  it('presses Enter and deletes characters as key events', async () => {
    const device = new FakeDevice(screens);
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    await executor.execute({ kind: 'enter' });
    await executor.execute({ kind: 'delete', count: 3 });

    expect(device.calls).toEqual([{ op: 'enter' }, { op: 'delete', count: 3 }]);
  });

  it('waits without touching the device', async () => {
    const device = new FakeDevice(screens);
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    const started = Date.now();
    await executor.execute({ kind: 'wait', durationMs: 30 });

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
    expect(device.calls).toEqual([]);
  });

  it('retries a failed primitive once', async () => {
    const device = new FakeDevice(screens);
    device.tapFailures = [new Error('input failed')];
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    await executor.execute({ kind: 'tap', point: { x: 1, y: 2 } });

    expect(device.calls).toEqual([{ op: 'tap', point: { x: 1, y: 2 } }]);
  });

  it('reports ActionExecutionFailed after the retry', async () => {
    const device = new FakeDevice(screens);
    device.tapFailures = [new Error('input failed'), new Error('input failed again')];
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    await expect(executor.execute({ kind: 'tap', point: { x: 1, y: 2 } })).rejects.toMatchObject({
      kind: 'ActionExecutionFailed',
      message: 'tap failed: input failed again',
    });
  });

  it('passes DeviceUnreachable through without retrying', async () => {
    const device = new FakeDevice(screens);
    device.tapFailures = [new AgentError('DeviceUnreachable', 'device offline')];
    const executor = new ActionExecutor(device, { timeoutMs: 1000, settleMs: 0 });

    await expect(executor.execute({ kind: 'tap', point: { x: 1, y: 2 } })).rejects.toMatchObject({
      kind: 'DeviceUnreachable',
    });
    expect(device.calls).toEqual([]);
  });

  it('times out a hanging primitive', async () => {
    const device = new FakeDevice(screens);
    device.pressBack = () => new Promise<void>(() => {});
    const executor = new ActionExecutor(device, { timeoutMs: 20, settleMs: 0, retries: 0 });

    await expect(executor.pressBack()).rejects.toMatchObject({
      kind: 'ActionExecutionFailed',
      message: 'back failed: back timed out after 20ms',
    });
  });
});
