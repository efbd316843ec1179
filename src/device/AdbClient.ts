import { execFile } from 'node:child_process';
import type { DeviceInfo } from '../types/index.js';

export type AdbErrorType =
  | 'DEVICE_OFFLINE'
  | 'DEVICE_UNAUTHORIZED'
  | 'DEVICE_NOT_FOUND'
  | 'CONNECTION_RESET'
  | 'COMMAND_TIMEOUT'
  | 'INSTALL_FAILED'
  | 'UNKNOWN';

type ExecError = Error & { stderr?: string; stdout?: string; killed?: boolean };

function isExecError(error: unknown): error is ExecError {
  return error instanceof Error;
}

export class AdbCommandError extends Error {
  constructor(
    public readonly type: AdbErrorType,
    message: string,
    public readonly stderr = '',
  ) {
    super(message);
    this.name = 'AdbCommandError';
  }
}

/** Errors after which talking to the device again is pointless */
export function isDeviceLost(type: AdbErrorType): boolean {
  return type === 'DEVICE_OFFLINE' || type === 'DEVICE_UNAUTHORIZED' || type === 'DEVICE_NOT_FOUND';
}

export function classifyAdbError(error: unknown): AdbErrorType {
  if (error instanceof AdbCommandError) return error.type;
  if (isExecError(error) && error.killed) return 'COMMAND_TIMEOUT';
  const msg = [
    isExecError(error) ? error.message : '',
    isExecError(error) ? (error.stderr ?? '') : '',
    String(error),
  ]
    .join(' ')
    .toLowerCase();

  if (msg.includes('device offline')) return 'DEVICE_OFFLINE';
  if (msg.includes('unauthorized')) return 'DEVICE_UNAUTHORIZED';
  if (msg.includes('connection reset') || msg.includes('econnreset') || msg.includes('broken pipe')) return 'CONNECTION_RESET';
  if (
    msg.includes('device not found') ||
    msg.includes('no devices/emulators found') ||
    msg.includes('no such device') ||
    msg.includes('enoent')
  ) {
    return 'DEVICE_NOT_FOUND';
  }
  if (msg.includes('install_failed') || msg.includes('failure [')) return 'INSTALL_FAILED';
  return 'UNKNOWN';
}

function runExecFile(file: string, args: string[], timeoutMs: number): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'utf8', timeout: timeoutMs, maxBuffer: 32 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(Object.assign(error, { stderr: String(stderr), stdout: String(stdout) }));
        } else {
          resolve({ stdout: String(stdout), stderr: String(stderr) });
        }
      },
    );
  });
}

export interface AdbClientOptions {
  adbPath?: string;
  serial?: string;
  timeoutMs?: number;
}

/**
 * Thin wrapper over the adb binary. Every command is bounded by a timeout
 * and failures come back as AdbCommandError with a classified type.
 */
export class AdbClient {
  readonly adbPath: string;
  readonly serial?: string;
  private timeoutMs: number;

  constructor(opts: AdbClientOptions = {}) {
    this.adbPath = opts.adbPath ?? 'adb';
    this.serial = opts.serial;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  async exec(args: string[], timeoutMs = this.timeoutMs): Promise<string> {
    const fullArgs = this.serial ? ['-s', this.serial, ...args] : args;
    try {
      const { stdout } = await runExecFile(this.adbPath, fullArgs, timeoutMs);
      return stdout;
    } catch (err) {
      const type = classifyAdbError(err);
      const stderr = isExecError(err) ? (err.stderr ?? '') : '';
      const detail = stderr.trim() || (isExecError(err) ? err.message : String(err));
      throw new AdbCommandError(type, `adb ${args.join(' ')} failed (${type}): ${detail}`, stderr);
    }
  }

  async shell(command: string, timeoutMs?: number): Promise<string> {
    const out = await this.exec(['shell', command], timeoutMs);
    // input/am report failures on stdout with exit code 0
    if (/^(?:error:|Exception occurred|java\.lang\.\w+Exception)/im.test(out)) {
      throw new AdbCommandError(classifyAdbError(new Error(out)), `adb shell ${command} reported: ${out.trim()}`);
    }
    return out.trim();
  }

  async pull(remote: string, local: string): Promise<void> {
    await this.exec(['pull', remote, local]);
  }

  async install(apkPath: string): Promise<void> {
    const out = await this.exec(['install', '-r', apkPath], Math.max(this.timeoutMs, 120_000));
    if (!out.includes('Success')) {
      throw new AdbCommandError('INSTALL_FAILED', `Install of ${apkPath} failed: ${out.trim()}`);
    }
  }
}

/** Parse `adb devices -l` output. */
export function parseDeviceList(output: string): DeviceInfo[] {
  const devices: DeviceInfo[] = [];
  for (const line of output.split('\n').slice(1)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('*')) continue;
    const [serial, state, ...rest] = trimmed.split(/\s+/);
    if (!serial || !state) continue;
    const model = rest.find((p) => p.startsWith('model:'))?.slice('model:'.length);
    devices.push({ serial, state, model });
  }
  return devices;
}

export async function listDevices(adbPath = 'adb', timeoutMs = 10_000): Promise<DeviceInfo[]> {
  const out = await new AdbClient({ adbPath, timeoutMs }).exec(['devices', '-l']);
  return parseDeviceList(out);
}
