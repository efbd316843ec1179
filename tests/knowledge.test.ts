import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { isDuplicateDescription, mergeObservation, normalizeDescription } from '../src/memory/KnowledgeMerger.js';
import { KnowledgeStore, isSafeAppId } from '../src/memory/KnowledgeStore.js';
import { buildKnowledgeContext, elementLabel } from '../src/memory/KnowledgeInjector.js';
import type { KnowledgeEntry } from '../src/memory/types.js';
import { AgentError } from '../src/agent/errors.js';
import { APP, fixture, screenFromXml } from './helpers.js';

const obs = (description: string, elementSignature = 'el-1') => ({
  screenSignature: 'screen-1',
  elementSignature,
  description,
  action: 'tap' as const,
  verdict: 'success' as const,
});

describe('KnowledgeMerger', () => {
  it('normalizes case, whitespace and trailing punctuation', () => {
    expect(normalizeDescription('  Opens   the Menu.  ')).toBe('opens the menu');
  });

  it('treats near-identical wording as duplicate only with refinement', () => {
    const a = 'Opens the main settings menu';
    const b = 'Opens the settings menu';
    expect(isDuplicateDescription(a, b, false)).toBe(false);
    expect(isDuplicateDescription(a, b, true)).toBe(true);
  });

  it('creates an entry on first observation', () => {
    const entry = mergeObservation(APP, undefined, obs('Opens the menu'), { refinement: true, now: 100 });
    expect(entry).toEqual({
      app: APP,
      screenSignature: 'screen-1',
      elementSignature: 'el-1',
      elementLabel: undefined,
      descriptions: ['Opens the menu'],
      visits: 1,
      lastAction: 'tap',
      lastVerdict: 'success',
      createdAt: 100,
      updatedAt: 100,
    });
  });

  it('counts every visit but stores each description once', () => {
    const first = mergeObservation(APP, undefined, obs('Opens the menu'), { refinement: false, now: 1 });
    const second = mergeObservation(APP, first, obs('opens the menu.'), { refinement: false, now: 2 });
    const third = mergeObservation(APP, second, obs('Shows the share sheet'), { refinement: false, now: 3 });
    expect(second.descriptions).toEqual(['Opens the menu']);
    expect(third.descriptions).toEqual(['Opens the menu', 'Shows the share sheet']);
    expect(third.visits).toBe(3);
    expect(third.createdAt).toBe(1);
    expect(third.updatedAt).toBe(3);
    expect(first.visits).toBe(1);
  });
});

describe('KnowledgeStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pilot-kb-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists merged knowledge across store instances', () => {
    const store = new KnowledgeStore(dir, { refinement: true });
    store.open(APP).merge(obs('Opens the menu'));
    store.open(APP).merge(obs('Opens the menu'));
    store.dispose();

    const reopened = new KnowledgeStore(dir, { refinement: true });
    const entries = reopened.lookup(APP, 'screen-1');
    expect(entries).toHaveLength(1);
    expect(entries[0].visits).toBe(2);
    expect(entries[0].descriptions).toEqual(['Opens the menu']);
    reopened.dispose();
  });

  it('debounces writes until flush', () => {
    const store = new KnowledgeStore(dir, { refinement: true, flushDelayMs: 60_000 });
    store.open(APP).merge(obs('Opens the menu'));
    const file = path.join(dir, `${APP}.json`);
    expect(fs.existsSync(file)).toBe(false);
    store.open(APP).flush();
    expect(fs.existsSync(file)).toBe(true);
    store.dispose();
  });

  it('rejects unsafe app identifiers', () => {
    const store = new KnowledgeStore(dir, { refinement: true });
    expect(isSafeAppId('../etc')).toBe(false);
    expect(isSafeAppId(APP)).toBe(true);
    expect(() => store.open('../etc')).toThrow(AgentError);
    expect(store.lookup('../etc', 'screen-1')).toEqual([]);
    store.dispose();
  });

  it('lists and clears apps', () => {
    const store = new KnowledgeStore(dir, { refinement: true });
    store.open(APP).merge(obs('Opens the menu'));
    store.open('com.example.other').merge(obs('Plays a song', 'el-2'));
    store.flush();

    expect(store.listApps().map((a) => a.app).sort()).toEqual([APP, 'com.example.other']);
    expect(store.open(APP).summary()).toMatchObject({ app: APP, screens: 1, entries: 1 });

    expect(store.clearApp(APP)).toBe(true);
    expect(store.hasApp(APP)).toBe(false);
    expect(fs.existsSync(path.join(dir, `${APP}.json`))).toBe(false);
    expect(store.clearApp(APP)).toBe(false);
    store.dispose();
  });

  it('keeps writing through a handle opened before the app was cleared', () => {
    const store = new KnowledgeStore(dir, { refinement: true });
    const kb = store.open(APP);
    kb.merge(obs('Opens the menu'));
    store.flush();

    expect(store.clearApp(APP)).toBe(true);
    expect(kb.lookup('screen-1')).toEqual([]);
    expect(store.listApps()).toEqual([]);

    kb.merge(obs('Opens settings', 'el-2'));
    store.flush();
    expect(store.open(APP)).toBe(kb);
    expect(store.hasApp(APP)).toBe(true);
    store.dispose();

    const reopened = new KnowledgeStore(dir, { refinement: true });
    const entries = reopened.lookup(APP, 'screen-1');
    expect(entries.map((e) => [e.elementSignature, e.descriptions])).toEqual([['el-2', ['Opens settings']]]);
    reopened.dispose();
  });

  it('starts fresh from a corrupt file', () => {
    fs.writeFileSync(path.join(dir, `${APP}.json`), '{not json', 'utf-8');
    const store = new KnowledgeStore(dir, { refinement: true });
    expect(store.lookup(APP, 'screen-1')).toEqual([]);
    store.dispose();
  });
});

describe('buildKnowledgeContext', () => {
  const screen = screenFromXml(fixture('login.xml'));
  const entry = (elementSignature: string, descriptions: string[], visits: number): KnowledgeEntry => ({
    app: APP,
    screenSignature: screen.signature,
    elementSignature,
    descriptions,
    visits,
    createdAt: 0,
    updatedAt: 0,
  });

  it('lists known elements on screen, most visited first', () => {
    const text = buildKnowledgeContext(
      [
        entry(screen.elements[0].signature, ['Focuses the email field'], 1),
        entry(screen.elements[2].signature, ['Signs in'], 3),
        entry('not-on-screen', ['Gone'], 9),
      ],
      screen.elements,
    );
    expect(text).toBe(
      [
        '## Known element behavior on this screen',
        '- [3] Log in: Signs in (seen 3x)',
        '- [1] Email: Focuses the email field (seen 1x)',
        'Notes come from earlier runs; trust the screenshot if they disagree.',
      ].join('\n'),
    );
  });

  it('is empty when nothing applies or nothing fits', () => {
    expect(buildKnowledgeContext([], screen.elements)).toBe('');
    expect(buildKnowledgeContext([entry(screen.elements[2].signature, ['Signs in'], 3)], screen.elements, 50)).toBe('');
  });

  it('labels elements by text, description, then id', () => {
    expect(elementLabel(screen.elements[2])).toBe('Log in');
    expect(elementLabel(screen.elements[1])).toBe('Password');
    expect(elementLabel(screen.elements[4])).toBe('list');
  });
});
