import { Role } from '@tagsim/shared';
import type { FieldBounds, Position, StepFrame } from '@tagsim/shared';

/** What to draw in a cell; a higher value wins when players share a cell. */
export enum DrawCell {
  None = 0,
  Runner = 1,
  It = 2,
  /** the player tagged this step */
  YoureIt = 3,
}

// Default canvas limits; larger fields are scaled down to fit
export const MAX_CANVAS_WIDTH = 80;
export const MAX_CANVAS_HEIGHT = 40;

const GLYPHS: Record<DrawCell, string> = {
  [DrawCell.None]: ' ',
  [DrawCell.Runner]: '.',
  [DrawCell.It]: '*',
  [DrawCell.YoureIt]: "*-You're It!",
};

export class TagCanvas {
  readonly width: number;
  readonly height: number;
  private readonly field: FieldBounds;
  private readonly grid: DrawCell[][];

  /** Canvas size defaults to one character per field cell. */
  constructor(field: FieldBounds, width = field.width, height = field.height) {
    this.field = { ...field };
    this.width = width;
    this.height = height;
    this.grid = Array.from({ length: height }, () => new Array<DrawCell>(width).fill(DrawCell.None));
  }

  cellAt(col: number, row: number): DrawCell { return this.grid[row]?.[col] ?? DrawCell.None; }

  set(position: Position, cell: DrawCell): void {
    if (this.width === 0 || this.height === 0) return;
    const col = Math.min(this.width - 1, Math.floor(position.x * this.width / this.field.width));
    const row = Math.min(this.height - 1, Math.floor(position.y * this.height / this.field.height));
    if (cell > this.grid[row][col]) this.grid[row][col] = cell;
  }

  toString(): string {
    const lines = ['='.repeat(this.width)];
    for (const row of this.grid) {
      let line = '';
      let x = 0;
      while (x < row.length) {
        // long glyphs overprint the cells after them
        const chars = GLYPHS[row[x]];
        line += chars;
        x += chars.length;
      }
      lines.push(line);
    }
    return lines.join('\n');
  }
}

export function canvasFor(field: FieldBounds): TagCanvas {
  return new TagCanvas(field, Math.min(field.width, MAX_CANVAS_WIDTH), Math.min(field.height, MAX_CANVAS_HEIGHT));
}

export function renderFrame(frame: StepFrame, canvas: TagCanvas = canvasFor(frame.field)): TagCanvas {
  const tagged = new Set(frame.tags.map(t => t.tagged));
  for (const p of frame.players) {
    const cell = tagged.has(p.player) ? DrawCell.YoureIt : p.role === Role.It ? DrawCell.It : DrawCell.Runner;
    canvas.set(p.position, cell);
  }
  return canvas;
}
