export { OpenAiCompatibleClient, toDataUrl } from './OpenAiCompatibleClient.js';
export type { VlmClient, VlmRequest, VlmResponse, VlmUsage } from './types.js';
