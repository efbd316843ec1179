import { describe, it, expect } from 'vitest';
import {
  AdbClient,
  AdbCommandError,
  classifyAdbError,
  isDeviceLost,
  parseDeviceList,
} from '../src/device/AdbClient.js';
import { AndroidDevice, escapeInputText, parseFocusedPackage, parseWmSize } from '../src/device/AndroidDevice.js';
import { parseBadging } from '../src/device/apk.js';

describe('adb output parsers', () => {
  it('prefers the override size', () => {
    expect(parseWmSize('Physical size: 1080x2400\nOverride size: 720x1600')).toEqual({ width: 720, height: 1600 });
    expect(parseWmSize('Physical size: 1080x2400')).toEqual({ width: 1080, height: 2400 });
    expect(parseWmSize('nothing')).toBeNull();
  });

  it('reads the focused package', () => {
    expect(
      parseFocusedPackage('  mCurrentFocus=Window{a1b2c3 u0 com.example.notes/com.example.notes.MainActivity}'),
    ).toBe('com.example.notes');
    expect(parseFocusedPackage('  mFocusedApp=ActivityRecord{1234 u0 com.android.settings/.Settings t12}')).toBe(
      'com.android.settings',
    );
    expect(parseFocusedPackage('mCurrentFocus=null')).toBeNull();
  });

  it('escapes text for input text', () => {
    expect(escapeInputText('hi there & you')).toBe('hi%sthere%s\\&%syou');
    expect(escapeInputText("it's")).toBe("it\\'s");
  });

  it('lists attached devices', () => {
    const output = [
      'List of devices attached',
      'emulator-5554          device product:sdk model:Pixel_7 device:emu',
      'R58M20ABCDE            unauthorized',
      '',
    ].join('\n');
    expect(parseDeviceList(output)).toEqual([
      { serial: 'emulator-5554', state: 'device', model: 'Pixel_7' },
      { serial: 'R58M20ABCDE', state: 'unauthorized', model: undefined },
    ]);
  });

  it('reads package details from aapt badging', () => {
    const output = [
      "package: name='com.example.notes' versionCode='3' versionName='1.2.0' platformBuildVersionName='14'",
      "application-label:'Notes'",
      "launchable-activity: name='com.example.notes.MainActivity'  label='Notes' icon=''",
    ].join('\n');
    expect(parseBadging(output)).toEqual({
      packageName: 'com.example.notes',
      versionName: '1.2.0',
      label: 'Notes',
      launchableActivity: 'com.example.notes.MainActivity',
    });
    expect(parseBadging('garbage')).toBeNull();
  });
});

describe('adb errors', () => {
  it('classifies common failures', () => {
    expect(classifyAdbError(new Error('error: device offline'))).toBe('DEVICE_OFFLINE');
    expect(classifyAdbError(new Error('adb: device unauthorized.'))).toBe('DEVICE_UNAUTHORIZED');
    expect(classifyAdbError(Object.assign(new Error('Command failed'), { killed: true }))).toBe('COMMAND_TIMEOUT');
    expect(classifyAdbError(new Error('Failure [INSTALL_FAILED_VERSION_DOWNGRADE]'))).toBe('INSTALL_FAILED');
    expect(classifyAdbError(new AdbCommandError('CONNECTION_RESET', 'reset'))).toBe('CONNECTION_RESET');
    expect(classifyAdbError(new Error('weird'))).toBe('UNKNOWN');
  });

  it('knows which failures mean the device is gone', () => {
    expect(isDeviceLost('DEVICE_OFFLINE')).toBe(true);
    expect(isDeviceLost('COMMAND_TIMEOUT')).toBe(false);
  });

  it('reports a missing adb binary as a missing device', async () => {
    const adb = new AdbClient({ adbPath: '/nonexistent/adb', timeoutMs: 5000 });
    await expect(adb.exec(['devices'])).rejects.toMatchObject({ type: 'DEVICE_NOT_FOUND' });
  });

  it('sends Enter and batched deletes as key events', async () => {
    const device = new AndroidDevice({
      adbPath: '/nonexistent/adb',
      timeoutMs: 5000,
      screenshotDir: '/sdcard/test',
      xmlDir: '/sdcard/test',
    });
    const commands: string[] = [];
    device.adb.shell = async (command: string) => {
      commands.push(command);
      return '';
    };

    await device.pressEnter();
    await device.pressDelete(3);
    await device.pressDelete(0);

    expect(commands).toEqual(['input keyevent 66', 'input keyevent 67 67 67']);
  });

  it('surfaces a lost device as DeviceUnreachable', async () => {
    const device = new AndroidDevice({
      adbPath: '/nonexistent/adb',
      timeoutMs: 5000,
      screenshotDir: '/sdcard/test',
      xmlDir: '/sdcard/test',
    });
    await expect(device.tap({ x: 1, y: 2 })).rejects.toMatchObject({ kind: 'DeviceUnreachable' });
  });
});
