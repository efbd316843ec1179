#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../agent/config.js';
import { createRuntime } from '../agent/runtime.js';
import { createAgentMcpServer } from '../mcp/agent-mcp-server.js';
import { RunManager } from '../task/run-manager.js';

const { values: args } = parseArgs({
  options: {
    config: { type: 'string', short: 'c' },
    device: { type: 'string', short: 'd' },
  },
  strict: false,
});

async function main() {
  // 将日志输出到 stderr，避免干扰 stdio 通信
  const log = (...parts: unknown[]) => console.error('[android-pilot-mcp]', ...parts);
  console.log = (...parts: unknown[]) => console.error(...parts);

  const config = loadConfig(typeof args.config === 'string' ? args.config : undefined);
  if (typeof args.device === 'string') config.device.serial = args.device;

  const runtime = createRuntime(config);
  const runManager = new RunManager({ createSession: runtime.sessionFactory });

  log('Creating MCP server...');
  const mcpServer = createAgentMcpServer(runManager, runtime.knowledge);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  log('MCP server connected via stdio. Ready for requests.');

  // 优雅关闭
  const shutdown = async () => {
    log('Shutting down...');
    await mcpServer.close();
    runManager.dispose();
    runtime.dispose();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[android-pilot-mcp] Fatal error:', err);
  process.exit(1);
});
