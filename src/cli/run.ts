#!/usr/bin/env node

import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { loadConfig } from '../agent/config.js';
import { errorMessage, isAgentError } from '../agent/errors.js';
import { createRuntime } from '../agent/runtime.js';
import { isSuccessfulOutcome } from '../agent/session-controller.js';
import type { SessionEvent } from '../agent/types.js';
import { inspectApk } from '../device/apk.js';

const USAGE = `Usage: android-pilot <apk_path> <task_instruction> [options]

Options:
  --explore           Explore the app and build its knowledge base
  --config <path>     Settings file (default: settings.yaml or $PILOT_CONFIG)
  --device <serial>   adb device serial (default: $ANDROID_SERIAL or the only device)
  --package <name>    Package name, skips reading it from the APK
  --no-install        Assume the APK is already installed
  -h, --help          Show this help`;

const { values: args, positionals } = parseArgs({
  options: {
    explore: { type: 'boolean', default: false },
    config: { type: 'string', short: 'c' },
    device: { type: 'string', short: 'd' },
    package: { type: 'string', short: 'p' },
    'no-install': { type: 'boolean', default: false },
    help: { type: 'boolean', short: 'h', default: false },
  },
  allowPositionals: true,
});

async function main(): Promise<number> {
  if (args.help || positionals.length < 2) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }
  const [apkPath, ...goalWords] = positionals;
  const goal = goalWords.join(' ');

  if (!fs.existsSync(apkPath)) {
    console.error(`[Device] APK not found: ${apkPath}`);
    return 1;
  }

  const config = loadConfig(args.config);
  if (args.device) config.device.serial = args.device;

  const packageName = args.package ?? (await inspectApk(apkPath)).packageName;
  const runtime = createRuntime(config);

  try {
    if (!args['no-install']) {
      console.log(`[Device] Installing ${apkPath} (${packageName})...`);
      await runtime.device.installApk(apkPath);
    }

    const mode = args.explore ? 'explore' : 'execute';
    const session = runtime.createSession({ goal, mode, app: packageName, packageName });

    // Ctrl+C 只请求取消，当前轮结束后退出
    const onSigint = () => {
      console.log('\n[Session] Cancelling after the current round (Ctrl+C again to force quit)...');
      session.cancel('Interrupted by user');
      process.once('SIGINT', () => process.exit(130));
    };
    process.once('SIGINT', onSigint);

    session.on('event', (event: SessionEvent) => {
      if (event.type === 'plan_created') {
        event.subGoals.forEach((g, i) => console.log(`  ${i + 1}. ${g}`));
      }
    });

    const result = await session.run();
    process.off('SIGINT', onSigint);

    console.log(`\nStatus: ${result.status}${result.kind ? ` (${result.kind})` : ''}`);
    console.log(`Rounds: ${result.rounds}`);
    console.log(`Message: ${result.message}`);
    console.log(`Tokens: ${result.tokenUsage.total} over ${result.tokenUsage.calls} model calls`);
    return isSuccessfulOutcome(result, mode) ? 0 : 1;
  } finally {
    runtime.dispose();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    const prefix = isAgentError(err) ? `[${err.kind}] ` : '';
    console.error(`${prefix}${errorMessage(err)}`);
    process.exit(1);
  });
