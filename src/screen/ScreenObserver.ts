import fs from 'node:fs/promises';
import type { DeviceController, ScreenSize, ScreenState } from '../types/index.js';
import { AgentError, errorMessage, isAgentError } from '../agent/errors.js';
import { parseUiHierarchy } from './UiHierarchyParser.js';
import { normalizeElements } from './ElementNormalizer.js';
import { computeFingerprint, computeScreenSignature, hashBytes } from './ScreenSignature.js';

export interface ScreenObserverOptions {
  /** Local directory screenshots and dumps are pulled into */
  captureDir: string;
  minElementDist: number;
}

/**
 * Captures the device screen and turns it into a ScreenState.
 * A missing screenshot is fatal; a missing hierarchy only means no elements.
 */
export class ScreenObserver {
  private size: ScreenSize | null = null;

  constructor(
    private device: DeviceController,
    private opts: ScreenObserverOptions,
  ) {}

  async capture(label: string): Promise<ScreenState> {
    const size = await this.screenSize();

    let screenshotPath: string;
    let xml: string | null;
    let image: Buffer;
    try {
      ({ screenshotPath, xml } = await this.device.capture(this.opts.captureDir, label));
      image = await fs.readFile(screenshotPath);
    } catch (err) {
      if (isAgentError(err)) throw err;
      throw new AgentError('DeviceUnreachable', `Screen capture failed: ${errorMessage(err)}`, { cause: err });
    }

    const elements = xml ? normalizeElements(parseUiHierarchy(xml), this.opts.minElementDist) : [];
    const foregroundPackage = await this.device.foregroundPackage().catch((err: unknown) => {
      console.log(`[Screen] Could not read foreground package: ${errorMessage(err)}`);
      return null;
    });
    const imageHash = hashBytes(image);

    return {
      label,
      capturedAt: Date.now(),
      screenshotPath,
      width: size.width,
      height: size.height,
      foregroundPackage,
      elements,
      signature: computeScreenSignature(foregroundPackage, elements, imageHash),
      fingerprint: computeFingerprint(elements, imageHash),
    };
  }

  private async screenSize(): Promise<ScreenSize> {
    if (this.size) return this.size;
    try {
      this.size = await this.device.screenSize();
    } catch (err) {
      if (isAgentError(err)) throw err;
      throw new AgentError('DeviceUnreachable', `Cannot read screen size: ${errorMessage(err)}`, { cause: err });
    }
    return this.size;
  }
}
