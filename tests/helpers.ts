import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { DeviceCapture, DeviceController, Point, ScreenSize, ScreenState } from '../src/types/index.js';
import type { VlmClient, VlmRequest, VlmResponse } from '../src/vlm/types.js';
import { resolveConfig, type PilotConfig } from '../src/agent/config.js';
import { createRuntime, type Runtime } from '../src/agent/runtime.js';
import { KnowledgeStore } from '../src/memory/KnowledgeStore.js';
import { parseUiHierarchy } from '../src/screen/UiHierarchyParser.js';
import { normalizeElements } from '../src/screen/ElementNormalizer.js';
import { computeFingerprint, computeScreenSignature, hashBytes } from '../src/screen/ScreenSignature.js';

export const APP = 'com.example.notes';

export function fixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

// ===== UI dumps =====

export interface NodeSpec {
  cls?: string;
  text?: string;
  id?: string;
  desc?: string;
  bounds: [number, number, number, number];
  clickable?: boolean;
  scrollable?: boolean;
  checked?: boolean;
}

function esc(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** uiautomator-style dump with the given nodes as children of a full-screen root */
export function makeXml(nodes: NodeSpec[], pkg = APP): string {
  const children = nodes.map((n) => {
    const [x1, y1, x2, y2] = n.bounds;
    return (
      `<node text="${esc(n.text ?? '')}" resource-id="${esc(n.id ?? '')}" class="${n.cls ?? 'android.widget.Button'}" ` +
      `package="${pkg}" content-desc="${esc(n.desc ?? '')}" checked="${n.checked ? 'true' : 'false'}" ` +
      `clickable="${n.clickable === false ? 'false' : 'true'}" enabled="true" focusable="false" ` +
      `scrollable="${n.scrollable ? 'true' : 'false'}" long-clickable="false" bounds="[${x1},${y1}][${x2},${y2}]" />`
    );
  });
  return (
    `<?xml version="1.0" encoding="UTF-8"?><hierarchy rotation="0">` +
    `<node text="" resource-id="" class="android.widget.FrameLayout" package="${pkg}" content-desc="" ` +
    `clickable="false" enabled="true" focusable="false" scrollable="false" bounds="[0,0][1080,2400]">` +
    children.join('') +
    `</node></hierarchy>`
  );
}

/** Build a ScreenState the way ScreenObserver does, without a device. */
export function screenFromXml(
  xml: string,
  opts: { label?: string; pkg?: string | null; image?: string; minDist?: number; width?: number; height?: number } = {},
): ScreenState {
  const elements = normalizeElements(parseUiHierarchy(xml), opts.minDist ?? 30);
  const imageHash = hashBytes(Buffer.from(opts.image ?? 'image'));
  const pkg = opts.pkg === undefined ? APP : opts.pkg;
  return {
    label: opts.label ?? 'test',
    capturedAt: 0,
    screenshotPath: `/tmp/${opts.label ?? 'test'}.png`,
    width: opts.width ?? 1080,
    height: opts.height ?? 2400,
    foregroundPackage: pkg,
    elements,
    signature: computeScreenSignature(pkg, elements, imageHash),
    fingerprint: computeFingerprint(elements, imageHash),
  };
}

// ===== Fake device =====

export interface ScriptedScreen {
  xml: string | null;
  image?: string;
  pkg?: string;
}

export type DeviceCall =
  | { op: 'tap'; point: Point }
  | { op: 'longPress'; point: Point; durationMs: number }
  | { op: 'swipe'; from: Point; to: Point; durationMs: number }
  | { op: 'typeText'; text: string }
  | { op: 'back' }
  | { op: 'enter' }
  | { op: 'delete'; count: number }
  | { op: 'launch'; packageName: string }
  | { op: 'stop'; packageName: string }
  | { op: 'install'; apkPath: string };

/**
 * In-process DeviceController. Screens come from a script indexed by capture
 * count; the foreground package is the one of the last captured screen.
 */
export class FakeDevice implements DeviceController {
  calls: DeviceCall[] = [];
  captures = 0;
  /** Throw this from the next N tap() calls */
  tapFailures: Array<Error> = [];
  size: ScreenSize = { width: 1080, height: 2400 };
  private lastPkg: string | null = APP;

  constructor(private script: (captureIndex: number) => ScriptedScreen) {}

  async screenSize(): Promise<ScreenSize> {
    return this.size;
  }

  async capture(localDir: string, label: string): Promise<DeviceCapture> {
    const screen = this.script(this.captures);
    this.captures++;
    fs.mkdirSync(localDir, { recursive: true });
    const screenshotPath = path.join(localDir, `${label}.png`);
    fs.writeFileSync(screenshotPath, screen.image ?? `frame-${this.captures}`);
    this.lastPkg = screen.pkg ?? APP;
    return { screenshotPath, xml: screen.xml };
  }

  async foregroundPackage(): Promise<string | null> {
    return this.lastPkg;
  }

  async tap(point: Point): Promise<void> {
    const failure = this.tapFailures.shift();
    if (failure) throw failure;
    this.calls.push({ op: 'tap', point });
  }

  async longPress(point: Point, durationMs: number): Promise<void> {
    this.calls.push({ op: 'longPress', point, durationMs });
  }

  async swipe(from: Point, to: Point, durationMs: number): Promise<void> {
    this.calls.push({ op: 'swipe', from, to, durationMs });
  }

  async typeText(text: string): Promise<void> {
    this.calls.push({ op: 'typeText', text });
  }

  async pressBack(): Promise<void> {
    this.calls.push({ op: 'back' });
  }

  async pressEnter(): Promise<void> {
    this.calls.push({ op: 'enter' });
  }

  async pressDelete(count: number): Promise<void> {
    this.calls.push({ op: 'delete', count });
  }

  async launchApp(packageName: string): Promise<void> {
    this.calls.push({ op: 'launch', packageName });
  }

  async stopApp(packageName: string): Promise<void> {
    this.calls.push({ op: 'stop', packageName });
  }

  async installApk(apkPath: string): Promise<void> {
    this.calls.push({ op: 'install', apkPath });
  }

  ops(): string[] {
    return this.calls.map((c) => c.op);
  }
}

// ===== Scripted model =====

export type VlmStage = 'plan' | 'decide' | 'reflect';

/** Plans carry no image, decisions one screenshot, reflections two. */
export function stageOf(req: VlmRequest): VlmStage {
  const images = req.images?.length ?? 0;
  if (images === 0) return 'plan';
  return images === 1 ? 'decide' : 'reflect';
}

export class ScriptedVlm implements VlmClient {
  readonly model = 'scripted';
  requests: VlmRequest[] = [];

  constructor(private handler: (req: VlmRequest, stage: VlmStage) => string) {}

  async complete(request: VlmRequest): Promise<VlmResponse> {
    this.requests.push(request);
    return {
      text: this.handler(request, stageOf(request)),
      usage: { prompt_tokens: 10, completion_tokens: 5 },
    };
  }

  count(stage: VlmStage): number {
    return this.requests.filter((r) => stageOf(r) === stage).length;
  }
}

// ===== Config =====

export function testConfig(overrides: { agent?: Record<string, unknown>; device?: Record<string, unknown> } = {}): PilotConfig {
  return resolveConfig(
    {
      agent: { request_interval_sec: 0, app_load_delay_sec: 0, ...overrides.agent },
      device: { min_element_dist: 30, ...overrides.device },
    },
    {},
  );
}

// ===== Runtime wired to fakes =====

export interface TestRuntime {
  runtime: Runtime;
  device: FakeDevice;
  knowledge: KnowledgeStore;
  cleanup(): void;
}

/** Runtime over a fake device; session logs off, knowledge in a temp dir. */
export function createTestRuntime(vlm: VlmClient, agent: Record<string, unknown> = {}): TestRuntime {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pilot-runtime-'));
  const device = new FakeDevice(() => ({
    xml: makeXml([{ id: 'com.example.notes:id/menu', text: 'Menu', bounds: [0, 0, 540, 200] }]),
  }));
  const knowledge = new KnowledgeStore(dir, { refinement: true });
  const runtime = createRuntime(testConfig({ agent }), { device, vlm, knowledge, runsDir: null });
  return {
    runtime,
    device,
    knowledge,
    cleanup: () => {
      runtime.dispose();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Model that finishes every task in one decision. */
export function finishingVlm(): ScriptedVlm {
  return new ScriptedVlm((_req, stage) => (stage === 'plan' ? '["Open the menu"]' : '{"action": "done", "summary": "Done"}'));
}

export async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
