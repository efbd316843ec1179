import type { DeviceController } from '../types/index.js';
import { AndroidDevice } from '../device/AndroidDevice.js';
import { KnowledgeStore } from '../memory/KnowledgeStore.js';
import type { VlmClient } from '../vlm/types.js';
import { OpenAiCompatibleClient } from '../vlm/OpenAiCompatibleClient.js';
import type { SessionFactory } from '../task/run-manager.js';
import type { CancelToken } from '../task/cancel-token.js';
import { validateConfig, type PilotConfig } from './config.js';
import { SessionController } from './session-controller.js';

export interface Runtime {
  config: PilotConfig;
  device: DeviceController;
  vlm: VlmClient;
  knowledge: KnowledgeStore;
  createSession(task: unknown, opts?: { sessionId?: string; cancelToken?: CancelToken }): SessionController;
  sessionFactory: SessionFactory;
  dispose(): void;
}

export interface RuntimeOverrides {
  device?: DeviceController;
  vlm?: VlmClient;
  knowledge?: KnowledgeStore;
  /** null disables session logs on disk */
  runsDir?: string | null;
}

/**
 * Process-wide wiring: one device, one model client and one knowledge store
 * shared by every session.
 */
export function createRuntime(config: PilotConfig, overrides: RuntimeOverrides = {}): Runtime {
  const device =
    overrides.device ??
    new AndroidDevice({
      adbPath: config.device.adbPath,
      serial: config.device.serial,
      timeoutMs: config.agent.deviceTimeoutMs,
      screenshotDir: config.device.screenshotDir,
      xmlDir: config.device.xmlDir,
    });

  let vlm = overrides.vlm;
  if (!vlm) {
    validateConfig(config);
    vlm = new OpenAiCompatibleClient(config.vlm);
  }
  const model = vlm;

  const knowledge =
    overrides.knowledge ??
    new KnowledgeStore(config.storage.knowledgeDir, { refinement: config.agent.documentationRefinement });

  const createSession: Runtime['createSession'] = (task, opts = {}) =>
    new SessionController(
      {
        device,
        vlm: model,
        config,
        knowledge,
        runsDir: overrides.runsDir,
        sessionId: opts.sessionId,
        cancelToken: opts.cancelToken,
      },
      task,
    );

  return {
    config,
    device,
    vlm: model,
    knowledge,
    createSession,
    sessionFactory: (task, sessionId, token) => createSession(task, { sessionId, cancelToken: token }),
    dispose: () => knowledge.dispose(),
  };
}
