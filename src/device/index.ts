export { AdbClient, AdbCommandError, classifyAdbError, isDeviceLost, listDevices, parseDeviceList } from './AdbClient.js';
export type { AdbErrorType, AdbClientOptions } from './AdbClient.js';
export { AndroidDevice, parseWmSize, parseFocusedPackage, escapeInputText } from './AndroidDevice.js';
export type { AndroidDeviceOptions } from './AndroidDevice.js';
export { inspectApk, parseBadging, findAapt } from './apk.js';
export type { ApkInfo } from './apk.js';
