#!/usr/bin/env node

import { parseArgs } from 'node:util';
import Fastify from 'fastify';
import { registerRoutes, installErrorHandler } from '../api/index.js';
import { loadConfig } from '../agent/config.js';
import { createRuntime } from '../agent/runtime.js';
import { RunManager } from '../task/run-manager.js';

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '127.0.0.1';

const { values: args } = parseArgs({
  options: {
    port: { type: 'string', short: 'p' },
    host: { type: 'string', short: 'h' },
    config: { type: 'string', short: 'c' },
    device: { type: 'string', short: 'd' },
  },
  strict: false,
});

async function main() {
  const app = Fastify({ logger: true });

  const config = loadConfig(typeof args.config === 'string' ? args.config : undefined);
  if (typeof args.device === 'string') config.device.serial = args.device;

  const runtime = createRuntime(config);
  const runManager = new RunManager({ createSession: runtime.sessionFactory });

  // 错误处理
  installErrorHandler(app);

  // 注册 REST API 路由
  registerRoutes(app, runManager, runtime.knowledge);

  // 优先级: --port > PORT 环境变量 > 默认值
  const portStr = typeof args.port === 'string' ? args.port : process.env.PORT;
  const port = parseInt(portStr || String(DEFAULT_PORT), 10);
  const host = (typeof args.host === 'string' ? args.host : process.env.HOST) || DEFAULT_HOST;

  try {
    await app.listen({ port, host });
    app.log.info(`Android pilot server running at http://${host}:${port}`);
  } catch (err) {
    app.log.error(err);
    runManager.dispose();
    runtime.dispose();
    process.exit(1);
  }

  // 优雅关闭
  const shutdown = async () => {
    app.log.info('Shutting down...');
    runManager.dispose();
    runtime.dispose();
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
