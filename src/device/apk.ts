import { execFile } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface ApkInfo {
  packageName: string;
  label?: string;
  versionName?: string;
  launchableActivity?: string;
}

/** Parse `aapt dump badging` output. */
export function parseBadging(output: string): ApkInfo | null {
  const pkg = /^package: name='([^']+)'(?:.*?versionName='([^']*)')?/m.exec(output);
  if (!pkg) return null;
  const label = /^application-label(?:-[\w-]+)?:'([^']*)'/m.exec(output);
  const activity = /^launchable-activity: name='([^']+)'/m.exec(output);
  return {
    packageName: pkg[1],
    versionName: pkg[2] || undefined,
    label: label?.[1] || undefined,
    launchableActivity: activity?.[1],
  };
}

/** Newest aapt under $ANDROID_HOME (or $ANDROID_SDK_ROOT, ~/Android/Sdk) build-tools, else PATH. */
export function findAapt(env: Record<string, string | undefined> = process.env): string {
  const roots = [env.ANDROID_HOME, env.ANDROID_SDK_ROOT, path.join(os.homedir(), 'Android', 'Sdk')].filter(
    (r): r is string => Boolean(r),
  );
  const binary = process.platform === 'win32' ? 'aapt.exe' : 'aapt';
  for (const root of roots) {
    const buildTools = path.join(root, 'build-tools');
    if (!fs.existsSync(buildTools)) continue;
    const versions = fs.readdirSync(buildTools).sort().reverse();
    for (const v of versions) {
      const candidate = path.join(buildTools, v, binary);
      if (fs.existsSync(candidate)) return candidate;
    }
  }
  return binary;
}

export function inspectApk(apkPath: string, aaptPath = findAapt()): Promise<ApkInfo> {
  if (!fs.existsSync(apkPath)) {
    return Promise.reject(new Error(`APK not found: ${apkPath}`));
  }
  return new Promise((resolve, reject) => {
    execFile(aaptPath, ['dump', 'badging', apkPath], { encoding: 'utf8', timeout: 60_000, maxBuffer: 16 * 1024 * 1024 }, (error, stdout) => {
      if (error) {
        reject(new Error(`aapt failed for ${apkPath}: ${error.message}`, { cause: error }));
        return;
      }
      const info = parseBadging(String(stdout));
      if (!info) {
        reject(new Error(`No package name in aapt output for ${apkPath}`));
        return;
      }
      resolve(info);
    });
  });
}
