import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { AgentError } from './errors.js';

export type VlmProvider = 'gemini' | 'openai' | 'qwen';

export const DEFAULT_BASE_URLS: Record<VlmProvider, string> = {
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  openai: 'https://api.openai.com/v1',
  qwen: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
};

const DEFAULT_MODELS: Record<VlmProvider, string> = {
  gemini: 'gemini-1.5-flash',
  openai: 'gpt-4o',
  qwen: 'qwen-vl-max',
};

const API_KEY_ENV: Record<VlmProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  qwen: 'DASHSCOPE_API_KEY',
};

const providerSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['gemini', 'openai', 'qwen']));

const providerSettingsSchema = z
  .object({
    api_key: z.string().optional(),
    model_name: z.string().optional(),
    api_base: z.string().optional(),
  })
  .default({});

const settingsSchema = z.object({
  vlm_provider: providerSchema.default('gemini'),
  temperature: z.number().min(0).max(2).default(0),
  max_tokens: z.number().int().positive().default(1024),
  request_timeout_sec: z.number().positive().default(60),
  max_transport_retries: z.number().int().min(0).max(5).default(2),
  gemini: providerSettingsSchema,
  openai: providerSettingsSchema,
  qwen: providerSettingsSchema,
  agent: z
    .object({
      max_task_rounds: z.number().int().positive().default(20),
      max_explore_rounds: z.number().int().positive().default(50),
      request_interval_sec: z.number().min(0).default(3),
      app_load_delay_sec: z.number().min(0).default(5),
      documentation_refinement: z.boolean().default(true),
      max_decision_attempts: z.number().int().min(1).max(10).default(3),
      max_subgoal_failures: z.number().int().min(1).default(5),
      max_action_failures: z.number().int().min(0).default(2),
      device_timeout_sec: z.number().positive().default(30),
    })
    .default({}),
  device: z
    .object({
      serial: z.string().optional(),
      adb_path: z.string().default('adb'),
      screenshot_dir: z.string().default('/sdcard/android_pilot'),
      xml_dir: z.string().default('/sdcard/android_pilot'),
      min_element_dist: z.number().min(0).default(20),
      grid_cell_size: z.number().int().positive().default(200),
    })
    .default({}),
  storage: z
    .object({
      knowledge_dir: z.string().default('./knowledge'),
      runs_dir: z.string().default('./runs'),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface PilotConfig {
  vlm: {
    provider: VlmProvider;
    apiKey: string;
    model: string;
    baseURL: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
  };
  agent: {
    maxTaskRounds: number;
    maxExploreRounds: number;
    requestIntervalMs: number;
    appLoadDelayMs: number;
    documentationRefinement: boolean;
    maxDecisionAttempts: number;
    maxSubgoalFailures: number;
    maxActionFailures: number;
    deviceTimeoutMs: number;
  };
  device: {
    serial?: string;
    adbPath: string;
    screenshotDir: string;
    xmlDir: string;
    minElementDist: number;
    gridCellSize: number;
  };
  storage: {
    knowledgeDir: string;
    runsDir: string;
  };
}

type Env = Record<string, string | undefined>;

/** Older settings files point api_base at the full completions URL. */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/chat\/completions\/?$/, '').replace(/\/+$/, '');
}

/**
 * Apply environment overrides to raw settings and flatten them into the
 * runtime shape. Environment always wins over the file.
 */
export function resolveConfig(raw: unknown, env: Env = process.env): PilotConfig {
  const parsed = settingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AgentError('InvalidConfig', `Invalid settings: ${issues.join('; ')}`);
  }
  const s = parsed.data;

  let provider: VlmProvider = s.vlm_provider;
  if (env.VLM_PROVIDER) {
    const fromEnv = providerSchema.safeParse(env.VLM_PROVIDER);
    if (!fromEnv.success) {
      throw new AgentError('InvalidConfig', `Unsupported VLM_PROVIDER: ${env.VLM_PROVIDER}`);
    }
    provider = fromEnv.data;
  }
  const providerSettings = s[provider];

  return {
    vlm: {
      provider,
      apiKey: env[API_KEY_ENV[provider]] || providerSettings.api_key || '',
      model: providerSettings.model_name || DEFAULT_MODELS[provider],
      baseURL: normalizeBaseUrl(providerSettings.api_base || DEFAULT_BASE_URLS[provider]),
      temperature: s.temperature,
      maxTokens: s.max_tokens,
      timeoutMs: s.request_timeout_sec * 1000,
      maxRetries: s.max_transport_retries,
    },
    agent: {
      maxTaskRounds: s.agent.max_task_rounds,
      maxExploreRounds: s.agent.max_explore_rounds,
      requestIntervalMs: s.agent.request_interval_sec * 1000,
      appLoadDelayMs: s.agent.app_load_delay_sec * 1000,
      documentationRefinement: s.agent.documentation_refinement,
      maxDecisionAttempts: s.agent.max_decision_attempts,
      maxSubgoalFailures: s.agent.max_subgoal_failures,
      maxActionFailures: s.agent.max_action_failures,
      deviceTimeoutMs: s.agent.device_timeout_sec * 1000,
    },
    device: {
      serial: env.ANDROID_SERIAL || s.device.serial,
      adbPath: env.ADB_PATH || s.device.adb_path,
      screenshotDir: s.device.screenshot_dir,
      xmlDir: s.device.xml_dir,
      minElementDist: s.device.min_element_dist,
      gridCellSize: s.device.grid_cell_size,
    },
    storage: {
      knowledgeDir: s.storage.knowledge_dir,
      runsDir: s.storage.runs_dir,
    },
  };
}

/**
 * Load settings from a YAML file. A missing file falls back to defaults;
 * a file that exists but cannot be read or parsed is a startup error.
 */
export function loadConfig(filePath = process.env.PILOT_CONFIG || 'settings.yaml', env: Env = process.env): PilotConfig {
  if (!fs.existsSync(filePath)) {
    return resolveConfig({}, env);
  }
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new AgentError('InvalidConfig', `Cannot read settings file ${filePath}`, { cause: err });
  }
  return resolveConfig(raw, env);
}

/** Checks that only matter once a session is about to talk to the model. */
export function validateConfig(config: PilotConfig): void {
  if (!config.vlm.apiKey) {
    throw new AgentError(
      'InvalidConfig',
      `No API key for provider "${config.vlm.provider}". Set ${API_KEY_ENV[config.vlm.provider]} or ${config.vlm.provider}.api_key.`,
    );
  }
}
