import { describe, it, expect } from 'vitest';
import { OutcomeReflector, crashText, textsPresent } from '../src/agent/reflector.js';
import { diffScreens, summarizeDiff } from '../src/agent/screen-diff.js';
import { TokenTracker } from '../src/agent/token-tracker.js';
import type { SubGoal, Task } from '../src/agent/types.js';
import type { ResolvedAction } from '../src/types/index.js';
import { ScriptedVlm, makeXml, screenFromXml } from './helpers.js';

const task: Task = { goal: 'Sign in', mode: 'execute', packageName: 'com.example.notes' };
const subGoal: SubGoal = { description: 'Sign in', status: 'active', verifyText: [] };
const tap: ResolvedAction = { kind: 'tap', point: { x: 270, y: 100 } };

const signIn = screenFromXml(makeXml([{ id: 'com.example.notes:id/sign_in', text: 'Sign in', bounds: [0, 0, 540, 200] }]), {
  label: 'before',
});
const welcome = screenFromXml(
  makeXml([{ cls: 'android.widget.TextView', id: 'com.example.notes:id/welcome', text: 'Welcome back', bounds: [0, 0, 1080, 300] }]),
  { label: 'after' },
);

function reflector(reply = '') {
  const vlm = new ScriptedVlm(() => reply);
  const tokens = new TokenTracker();
  return { vlm, tokens, reflector: new OutcomeReflector(vlm, { minElementDist: 30 }, tokens) };
}

describe('screen text checks', () => {
  it('matches every needle case-insensitively', () => {
    expect(textsPresent(welcome, ['welcome', 'BACK'])).toBe(true);
    expect(textsPresent(welcome, ['welcome', 'inbox'])).toBe(false);
    expect(textsPresent(welcome, [])).toBe(false);
  });

  it('spots crash dialogs', () => {
    const crash = screenFromXml(makeXml([{ cls: 'android.widget.TextView', text: 'Notes keeps stopping', bounds: [0, 0, 1080, 200] }]));
    expect(crashText(crash)).toBe('Notes keeps stopping');
    expect(crashText(welcome)).toBeUndefined();
  });
});

describe('screen diff', () => {
  it('summarizes a change of screen', () => {
    const diff = diffScreens(signIn, welcome, 30);
    expect(diff.isNewScreen).toBe(true);
    expect(summarizeDiff(diff)).toBe('Opened a different screen; 1 element(s) appeared ("Welcome back"); 1 element(s) disappeared.');
  });

  it('reports state changes of the same element', () => {
    const unchecked = screenFromXml(makeXml([{ cls: 'android.widget.CheckBox', id: 'app:id/dark', text: 'Dark', bounds: [0, 0, 500, 100] }]));
    const checked = screenFromXml(
      makeXml([{ cls: 'android.widget.CheckBox', id: 'app:id/dark', text: 'Dark', checked: true, bounds: [0, 0, 500, 100] }]),
    );
    const diff = diffScreens(unchecked, checked, 30);
    expect(diff.changed).toHaveLength(1);
    expect(diff.isNewScreen).toBe(false);
    expect(summarizeDiff(diff)).toBe('1 element(s) changed state.');
  });

  it('has nothing to say about identical screens', () => {
    expect(summarizeDiff(diffScreens(signIn, signIn, 30))).toBe('No visible change.');
  });
});

describe('OutcomeReflector', () => {
  it('reports crash dialogs as errors without asking the model', async () => {
    const { vlm, reflector: r } = reflector();
    const crash = screenFromXml(makeXml([{ cls: 'android.widget.TextView', text: 'Notes has stopped', bounds: [0, 0, 1080, 200] }]));
    const result = await r.reflect({ task, subGoal, before: signIn, after: crash, action: tap, appPackage: 'com.example.notes' });
    expect(result).toEqual({ verdict: 'error', description: 'App crash dialog: "Notes has stopped"', pressBack: false });
    expect(vlm.requests).toHaveLength(0);
  });

  it('tolerates system dialogs in front of the app', async () => {
    const { reflector: r } = reflector('{"decision": "CONTINUE", "documentation": "Asks for a permission"}');
    const permission = screenFromXml(makeXml([{ text: 'Allow', bounds: [0, 0, 540, 200] }], 'com.android.permissioncontroller'), {
      pkg: 'com.android.permissioncontroller',
    });
    const result = await r.reflect({ task, subGoal, before: signIn, after: permission, action: tap, appPackage: 'com.example.notes' });
    expect(result).toEqual({ verdict: 'unexpected-change', description: 'Asks for a permission', pressBack: false });
  });

  it('calls an unchanged screen a no-op', async () => {
    const { vlm, reflector: r } = reflector();
    const result = await r.reflect({ task, subGoal, before: signIn, after: signIn, action: tap });
    expect(result).toEqual({ verdict: 'no-op', description: 'The screen did not change.', pressBack: false });
    expect(vlm.requests).toHaveLength(0);
  });

  it('accepts expected text as success', async () => {
    const { vlm, reflector: r } = reflector();
    const result = await r.reflect({
      task,
      subGoal,
      before: signIn,
      after: welcome,
      action: tap,
      intent: { operation: 'tap', expectedText: ['welcome'] },
    });
    expect(result.verdict).toBe('success');
    expect(result.description).toBe('Opened a different screen; 1 element(s) appeared ("Welcome back"); 1 element(s) disappeared.');
    expect(vlm.requests).toHaveLength(0);
  });

  it('asks the model with both screenshots otherwise', async () => {
    const { vlm, tokens, reflector: r } = reflector('Decision: BACK\nDocumentation: Opens the help page');
    const result = await r.reflect({ task, subGoal, before: signIn, after: welcome, action: tap, element: signIn.elements[0] });
    expect(result).toEqual({ verdict: 'unexpected-change', description: 'Opens the help page', pressBack: true });
    expect(vlm.requests[0].images).toEqual([signIn.screenshotPath, welcome.screenshotPath]);
    expect(vlm.requests[0].prompt).toContain('Action taken: tap (270,100) on "Sign in"');
    expect(tokens.getUsage().byPurpose.reflect).toBe(1);
  });

  it('maps INEFFECTIVE to no-op', async () => {
    const { reflector: r } = reflector('{"decision": "ineffective", "documentation": "Does nothing"}');
    const result = await r.reflect({ task, subGoal, before: signIn, after: welcome, action: tap });
    expect(result.verdict).toBe('no-op');
  });

  it('describes the change from the screen diff when the model documents N/A', async () => {
    const { reflector: r } = reflector('Decision: SUCCESS\nDocumentation: N/A');
    const result = await r.reflect({ task, subGoal, before: signIn, after: welcome, action: tap });
    expect(result).toEqual({
      verdict: 'success',
      description: 'Opened a different screen; 1 element(s) appeared ("Welcome back"); 1 element(s) disappeared.',
      pressBack: false,
    });
  });

  it('falls back to the screen diff when the reply is unusable', async () => {
    const { reflector: r } = reflector('hard to say');
    const result = await r.reflect({ task, subGoal, before: signIn, after: welcome, action: tap });
    expect(result).toEqual({
      verdict: 'unexpected-change',
      description: 'Opened a different screen; 1 element(s) appeared ("Welcome back"); 1 element(s) disappeared.',
      pressBack: false,
    });
  });
});
