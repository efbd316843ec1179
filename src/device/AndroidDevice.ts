import fs from 'node:fs/promises';
import path from 'node:path';
import type { DeviceCapture, DeviceController, Point, ScreenSize } from '../types/index.js';
import { AgentError } from '../agent/errors.js';
import { AdbClient, AdbCommandError, classifyAdbError, isDeviceLost } from './AdbClient.js';

export interface AndroidDeviceOptions {
  adbPath: string;
  serial?: string;
  timeoutMs: number;
  /** On-device staging directories for screencap and uiautomator dump */
  screenshotDir: string;
  xmlDir: string;
}

/** `wm size` output; an override size wins over the physical one. */
export function parseWmSize(output: string): ScreenSize | null {
  const override = /Override size:\s*(\d+)x(\d+)/.exec(output);
  const physical = /Physical size:\s*(\d+)x(\d+)/.exec(output);
  const m = override ?? physical;
  if (!m) return null;
  return { width: Number(m[1]), height: Number(m[2]) };
}

/** Package of the focused window from `dumpsys window` lines. */
export function parseFocusedPackage(output: string): string | null {
  const patterns = [
    /mCurrentFocus=Window\{[^}]*?\s([\w.]+)\/[\w.$]+\}/,
    /mFocusedApp=.*?\s([\w.]+)\/[\w.$]+/,
  ];
  for (const re of patterns) {
    const m = re.exec(output);
    if (m) return m[1];
  }
  return null;
}

/** Escape text for `input text`: spaces become %s, shell metacharacters are backslashed. */
export function escapeInputText(text: string): string {
  return text.replace(/([\\'"`$&|;<>()*?!#~{}[\]^])/g, '\\$1').replace(/ /g, '%s');
}

function px(v: number): string {
  return String(Math.round(v));
}

/**
 * DeviceController over adb. Transport errors that mean the device is gone
 * surface as AgentError('DeviceUnreachable'); everything else as the raw
 * AdbCommandError for the executor to classify.
 */
export class AndroidDevice implements DeviceController {
  readonly adb: AdbClient;
  private stagingReady = false;

  constructor(private opts: AndroidDeviceOptions) {
    this.adb = new AdbClient({ adbPath: opts.adbPath, serial: opts.serial, timeoutMs: opts.timeoutMs });
  }

  async screenSize(): Promise<ScreenSize> {
    const out = await this.run(() => this.adb.shell('wm size'));
    const size = parseWmSize(out);
    if (!size) throw new AgentError('DeviceUnreachable', `Unexpected "wm size" output: ${out}`);
    return size;
  }

  async capture(localDir: string, label: string): Promise<DeviceCapture> {
    await fs.mkdir(localDir, { recursive: true });
    await this.ensureStaging();

    const remoteShot = `${this.opts.screenshotDir}/${label}.png`;
    const screenshotPath = path.join(localDir, `${label}.png`);
    await this.run(() => this.adb.shell(`screencap -p ${remoteShot}`));
    await this.run(() => this.adb.pull(remoteShot, screenshotPath));

    const remoteXml = `${this.opts.xmlDir}/${label}.xml`;
    const xmlPath = path.join(localDir, `${label}.xml`);
    let xml: string | null = null;
    try {
      await this.run(() => this.adb.shell(`uiautomator dump ${remoteXml}`));
      await this.run(() => this.adb.pull(remoteXml, xmlPath));
      xml = await fs.readFile(xmlPath, 'utf-8');
    } catch (err) {
      if (err instanceof AgentError) throw err;
      // 动画或视频界面上 dump 经常失败，走网格模式
      console.log(`[Device] UI hierarchy dump failed for ${label}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { screenshotPath, xml };
  }

  async foregroundPackage(): Promise<string | null> {
    const out = await this.run(() => this.adb.shell("dumpsys window | grep -E 'mCurrentFocus|mFocusedApp'"));
    return parseFocusedPackage(out);
  }

  async tap(point: Point): Promise<void> {
    await this.run(() => this.adb.shell(`input tap ${px(point.x)} ${px(point.y)}`));
  }

  async longPress(point: Point, durationMs: number): Promise<void> {
    const [x, y] = [px(point.x), px(point.y)];
    await this.run(() => this.adb.shell(`input swipe ${x} ${y} ${x} ${y} ${px(durationMs)}`));
  }

  async swipe(from: Point, to: Point, durationMs: number): Promise<void> {
    await this.run(() =>
      this.adb.shell(`input swipe ${px(from.x)} ${px(from.y)} ${px(to.x)} ${px(to.y)} ${px(durationMs)}`),
    );
  }

  async typeText(text: string): Promise<void> {
    await this.run(() => this.adb.shell(`input text ${escapeInputText(text)}`));
  }

  async pressBack(): Promise<void> {
    await this.run(() => this.adb.shell('input keyevent 4'));
  }

  async pressEnter(): Promise<void> {
    await this.run(() => this.adb.shell('input keyevent 66'));
  }

  async pressDelete(count: number): Promise<void> {
    if (count < 1) return;
    // 一次 shell 调用发送多个 KEYCODE_DEL
    const keys = Array.from({ length: Math.floor(count) }, () => '67').join(' ');
    await this.run(() => this.adb.shell(`input keyevent ${keys}`));
  }

  async launchApp(packageName: string): Promise<void> {
    await this.run(() => this.adb.shell(`monkey -p ${packageName} -c android.intent.category.LAUNCHER 1`));
  }

  async stopApp(packageName: string): Promise<void> {
    await this.run(() => this.adb.shell(`am force-stop ${packageName}`));
  }

  async installApk(apkPath: string): Promise<void> {
    await this.run(() => this.adb.install(apkPath));
  }

  private async ensureStaging(): Promise<void> {
    if (this.stagingReady) return;
    const dirs = [...new Set([this.opts.screenshotDir, this.opts.xmlDir])];
    await this.run(() => this.adb.shell(`mkdir -p ${dirs.join(' ')}`));
    this.stagingReady = true;
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const type = err instanceof AdbCommandError ? err.type : classifyAdbError(err);
      if (isDeviceLost(type)) {
        throw new AgentError('DeviceUnreachable', err instanceof Error ? err.message : String(err), { cause: err });
      }
      throw err;
    }
  }
}
