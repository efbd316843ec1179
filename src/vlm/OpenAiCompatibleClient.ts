import fs from 'node:fs/promises';
import path from 'node:path';
import OpenAI from 'openai';
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from 'openai/resources/chat/completions.js';
import type { PilotConfig } from '../agent/config.js';
import { AgentError, errorMessage } from '../agent/errors.js';
import type { VlmClient, VlmRequest, VlmResponse } from './types.js';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export async function toDataUrl(imagePath: string): Promise<string> {
  const mime = MIME_TYPES[path.extname(imagePath).toLowerCase()] ?? 'image/png';
  const data = await fs.readFile(imagePath);
  return `data:${mime};base64,${data.toString('base64')}`;
}

/**
 * Gemini, OpenAI and Qwen (DashScope) all expose an OpenAI-compatible chat
 * endpoint, so one client covers the three providers; only baseURL differs.
 */
export class OpenAiCompatibleClient implements VlmClient {
  private openai: OpenAI;
  readonly model: string;

  constructor(private options: PilotConfig['vlm']) {
    this.model = options.model;
    this.openai = new OpenAI({
      baseURL: options.baseURL,
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  async complete(request: VlmRequest): Promise<VlmResponse> {
    const content: ChatCompletionContentPart[] = [{ type: 'text', text: request.prompt }];
    for (const image of request.images ?? []) {
      try {
        content.push({ type: 'image_url', image_url: { url: await toDataUrl(image) } });
      } catch (err) {
        throw new AgentError('DeviceUnreachable', `Cannot read screenshot ${image}: ${errorMessage(err)}`, { cause: err });
      }
    }

    const messages: ChatCompletionMessageParam[] = [];
    if (request.system) messages.push({ role: 'system', content: request.system });
    messages.push({ role: 'user', content });

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
      });
      return {
        text: response.choices[0]?.message?.content ?? '',
        usage: response.usage,
      };
    } catch (err) {
      throw new AgentError(
        'VlmUnavailable',
        `${this.options.provider} request failed after ${this.options.maxRetries + 1} attempt(s): ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
