import type { Bounds, GridSubarea, Point } from '../types/index.js';

export const GRID_SUBAREAS: readonly GridSubarea[] = [
  'center',
  'top-left',
  'top',
  'top-right',
  'left',
  'right',
  'bottom-left',
  'bottom',
  'bottom-right',
];

// 子区域在单元格内的相对位置
const SUBAREA_OFFSETS: Record<GridSubarea, [number, number]> = {
  center: [0.5, 0.5],
  'top-left': [0.25, 0.25],
  top: [0.5, 0.25],
  'top-right': [0.75, 0.25],
  left: [0.25, 0.5],
  right: [0.75, 0.5],
  'bottom-left': [0.25, 0.75],
  bottom: [0.5, 0.75],
  'bottom-right': [0.75, 0.75],
};

export function isGridSubarea(value: string): value is GridSubarea {
  return Object.hasOwn(SUBAREA_OFFSETS, value);
}

/**
 * Uniform grid over the screen. Cells are numbered from 1, left to right,
 * top to bottom; cells on the right and bottom edges are clipped to the screen.
 */
export class ScreenGrid {
  readonly rows: number;
  readonly cols: number;

  static isValid(width: number, height: number, cellSize: number): boolean {
    return [width, height, cellSize].every((v) => Number.isFinite(v) && v > 0);
  }

  constructor(
    readonly width: number,
    readonly height: number,
    readonly cellSize: number,
  ) {
    if (!ScreenGrid.isValid(width, height, cellSize)) {
      throw new RangeError(`Malformed grid: ${width}x${height} with cell size ${cellSize}`);
    }
    this.rows = Math.ceil(height / cellSize);
    this.cols = Math.ceil(width / cellSize);
  }

  get cellCount(): number {
    return this.rows * this.cols;
  }

  hasCell(cell: number): boolean {
    return Number.isInteger(cell) && cell >= 1 && cell <= this.cellCount;
  }

  cellBounds(cell: number): Bounds | null {
    if (!this.hasCell(cell)) return null;
    const row = Math.floor((cell - 1) / this.cols);
    const col = (cell - 1) % this.cols;
    return {
      x1: col * this.cellSize,
      y1: row * this.cellSize,
      x2: Math.min((col + 1) * this.cellSize, this.width),
      y2: Math.min((row + 1) * this.cellSize, this.height),
    };
  }

  resolve(cell: number, subarea: GridSubarea = 'center'): Point | null {
    const b = this.cellBounds(cell);
    if (!b) return null;
    const [fx, fy] = SUBAREA_OFFSETS[subarea];
    return {
      x: Math.round(b.x1 + (b.x2 - b.x1) * fx),
      y: Math.round(b.y1 + (b.y2 - b.y1) * fy),
    };
  }

  cellAt(point: Point): number {
    const col = Math.min(Math.max(Math.floor(point.x / this.cellSize), 0), this.cols - 1);
    const row = Math.min(Math.max(Math.floor(point.y / this.cellSize), 0), this.rows - 1);
    return row * this.cols + col + 1;
  }

  centerCell(): number {
    return this.cellAt({ x: Math.floor(this.width / 2), y: Math.floor(this.height / 2) });
  }

  describe(): string {
    return (
      `The screen is divided into a ${this.rows}x${this.cols} grid of ${this.cellSize}px cells, ` +
      `numbered 1 to ${this.cellCount} from left to right, top to bottom ` +
      `(${this.cols} cells per row).`
    );
  }
}
