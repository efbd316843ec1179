// 矩形区域（像素，左上角 x1,y1，右下角 x2,y2）
export interface Bounds {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

// 屏幕坐标
export interface Point {
  x: number;
  y: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

// 可交互元素
export interface UIElement {
  /** 1-based position in reading order; only meaningful within one capture */
  index: number;
  /** Stable-ish identity across captures of the same screen */
  signature: string;
  key: string;
  bounds: Bounds;
  center: Point;
  className: string;
  text?: string;
  resourceId?: string;
  contentDesc?: string;
  clickable: boolean;
  longClickable: boolean;
  scrollable: boolean;
  editable: boolean;
  checked: boolean;
  enabled: boolean;
}

// 一次截屏的状态
export interface ScreenState {
  label: string;
  capturedAt: number;
  screenshotPath: string;
  width: number;
  height: number;
  foregroundPackage: string | null;
  elements: UIElement[];
  /** Identifies the kind of screen; knowledge base partition key */
  signature: string;
  /** Covers texts and positions too; equal fingerprints mean nothing visibly moved */
  fingerprint: string;
}

// 日志中对截屏的引用
export interface ScreenRef {
  label: string;
  signature: string;
  fingerprint: string;
  screenshotPath: string;
  foregroundPackage: string | null;
  elementCount: number;
}

export function toScreenRef(screen: ScreenState): ScreenRef {
  return {
    label: screen.label,
    signature: screen.signature,
    fingerprint: screen.fingerprint,
    screenshotPath: screen.screenshotPath,
    foregroundPackage: screen.foregroundPackage,
    elementCount: screen.elements.length,
  };
}
