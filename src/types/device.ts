import type { Point, ScreenSize } from './screen.js';

export interface DeviceCapture {
  screenshotPath: string;
  /** uiautomator dump; null when the dump failed */
  xml: string | null;
}

export interface DeviceInfo {
  serial: string;
  state: string;
  model?: string;
}

/**
 * Everything the agent needs from a device. The adb-backed implementation
 * lives in src/device; tests use in-process fakes.
 */
export interface DeviceController {
  screenSize(): Promise<ScreenSize>;
  capture(localDir: string, label: string): Promise<DeviceCapture>;
  foregroundPackage(): Promise<string | null>;
  tap(point: Point): Promise<void>;
  longPress(point: Point, durationMs: number): Promise<void>;
  swipe(from: Point, to: Point, durationMs: number): Promise<void>;
  typeText(text: string): Promise<void>;
  pressBack(): Promise<void>;
  pressEnter(): Promise<void>;
  /** Backspace `count` times */
  pressDelete(count: number): Promise<void>;
  launchApp(packageName: string): Promise<void>;
  stopApp(packageName: string): Promise<void>;
  installApk(apkPath: string): Promise<void>;
}
