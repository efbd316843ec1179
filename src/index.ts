export * from './types/index.js';
export * from './agent/index.js';
export * from './screen/index.js';
export * from './memory/index.js';
export * from './vlm/index.js';
export * from './device/index.js';
export { RunManager, isTerminal, toRunView } from './task/run-manager.js';
export type { RunState, RunStatus, RunManagerOptions, SessionFactory } from './task/run-manager.js';
export { CancelToken } from './task/cancel-token.js';
export { registerRoutes, installErrorHandler, ApiError, ErrorCode } from './api/index.js';
export { createAgentMcpServer } from './mcp/agent-mcp-server.js';
export { VERSION } from './version.js';
