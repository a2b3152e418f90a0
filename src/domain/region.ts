/**
 * Region Definition
 *
 * Turns pointer input into a closed RegionPath and answers coverage
 * questions about it.
 *
 * Coverage uses the nonzero winding rule; a point lying on an edge or a
 * vertex is always covered. Pixel (x, y) is tested at the point (x, y).
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import {
  type BoundingBox,
  type Point,
  type PointerEvent,
  pointerEventSchema,
  type RegionPath,
  type SelectionOutcome,
} from '../0_types.js';

const EPSILON = 1e-9;
export const MIN_PATH_POINTS = 3;

// =============================================================================
// GEOMETRY
// =============================================================================

export function distinctPointCount(path: RegionPath): number {
  return new Set(path.map((p) => `${p.x},${p.y}`)).size;
}

export function isDegeneratePath(path: RegionPath): boolean {
  return distinctPointCount(path) < MIN_PATH_POINTS;
}

/** Inclusive pixel box: min floored, max ceiled */
export function boundingBoxOf(path: RegionPath): BoundingBox {
  if (path.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of path) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  const left = Math.floor(minX);
  const top = Math.floor(minY);
  return {
    x: left,
    y: top,
    width: Math.ceil(maxX) - left + 1,
    height: Math.ceil(maxY) - top + 1,
  };
}

/** Intersects the box with the image; the result is never smaller than 1x1. */
export function clampBox(
  box: BoundingBox,
  imageWidth: number,
  imageHeight: number
): BoundingBox {
  const clamp = (v: number, max: number) => Math.min(Math.max(v, 0), max);
  const left = clamp(box.x, imageWidth - 1);
  const top = clamp(box.y, imageHeight - 1);
  const right = clamp(box.x + box.width - 1, imageWidth - 1);
  const bottom = clamp(box.y + box.height - 1, imageHeight - 1);

  return {
    x: left,
    y: top,
    width: Math.max(right - left + 1, 1),
    height: Math.max(bottom - top + 1, 1),
  };
}

/** Absolute shoelace area */
export function polygonArea(path: RegionPath): number {
  let twice = 0;
  for (let i = 0; i < path.length; i++) {
    const a = path[i];
    const b = path[(i + 1) % path.length];
    twice += a.x * b.y - b.x * a.y;
  }
  return Math.abs(twice) / 2;
}

function cross(a: Point, b: Point, p: Point): number {
  return (b.x - a.x) * (p.y - a.y) - (p.x - a.x) * (b.y - a.y);
}

export function isOnBoundary(path: RegionPath, p: Point): boolean {
  for (let i = 0; i < path.length; i++) {
    const a = path[i];
    const b = path[(i + 1) % path.length];
    if (Math.abs(cross(a, b, p)) > EPSILON) continue;
    if (
      p.x >= Math.min(a.x, b.x) - EPSILON &&
      p.x <= Math.max(a.x, b.x) + EPSILON &&
      p.y >= Math.min(a.y, b.y) - EPSILON &&
      p.y <= Math.max(a.y, b.y) + EPSILON
    ) {
      return true;
    }
  }
  return false;
}

export function windingNumber(path: RegionPath, p: Point): number {
  let wn = 0;
  for (let i = 0; i < path.length; i++) {
    const a = path[i];
    const b = path[(i + 1) % path.length];
    if (a.y <= p.y) {
      if (b.y > p.y && cross(a, b, p) > 0) wn++;
    } else if (b.y <= p.y && cross(a, b, p) < 0) {
      wn--;
    }
  }
  return wn;
}

export function containsPoint(path: RegionPath, p: Point): boolean {
  return isOnBoundary(path, p) || windingNumber(path, p) !== 0;
}

export function ellipseContains(box: BoundingBox, p: Point): boolean {
  const rx = box.width / 2;
  const ry = box.height / 2;
  const cx = box.x + (box.width - 1) / 2;
  const cy = box.y + (box.height - 1) / 2;
  const dx = (p.x - cx) / rx;
  const dy = (p.y - cy) / ry;
  return dx * dx + dy * dy <= 1;
}

// =============================================================================
// COVERAGE MASK
// =============================================================================

export interface CoverageMask {
  box: BoundingBox;
  /** 1 = covered, row-major over `box` */
  cells: Uint8Array;
  insidePixels: number;
  fallback: 'none' | 'ellipse';
}

export function usesEllipseFallback(
  path: RegionPath,
  degenerateAreaRatio: number
): boolean {
  const bounds = boundingBoxOf(path);
  const area = polygonArea(path);
  return area < Math.max(1, degenerateAreaRatio * bounds.width * bounds.height);
}

/**
 * Rasterises coverage over `box` row by row. Equivalent to calling
 * containsPoint for every pixel (or ellipseContains plus the stroke itself
 * when the polygon encloses next to no area).
 */
export function buildCoverageMask(
  path: RegionPath,
  box: BoundingBox,
  degenerateAreaRatio: number
): CoverageMask {
  const cells = new Uint8Array(box.width * box.height);
  const fallback = usesEllipseFallback(path, degenerateAreaRatio)
    ? 'ellipse'
    : 'none';

  if (fallback === 'ellipse') {
    const ellipseBox = boundingBoxOf(path);
    for (let row = 0; row < box.height; row++) {
      for (let col = 0; col < box.width; col++) {
        const p = { x: box.x + col, y: box.y + row };
        if (ellipseContains(ellipseBox, p)) cells[row * box.width + col] = 1;
      }
    }
  } else {
    fillNonzero(path, box, cells);
  }

  markStroke(path, box, cells);

  let insidePixels = 0;
  for (const c of cells) insidePixels += c;
  return { box, cells, insidePixels, fallback };
}

function fillNonzero(
  path: RegionPath,
  box: BoundingBox,
  cells: Uint8Array
): void {
  const crossings: Array<{ x: number; dir: number }> = [];

  for (let row = 0; row < box.height; row++) {
    const y = box.y + row;
    crossings.length = 0;

    for (let i = 0; i < path.length; i++) {
      const a = path[i];
      const b = path[(i + 1) % path.length];
      const upward = a.y <= y && b.y > y;
      const downward = a.y > y && b.y <= y;
      if (!upward && !downward) continue;
      const x = a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y);
      crossings.push({ x, dir: upward ? 1 : -1 });
    }
    if (crossings.length === 0) continue;

    crossings.sort((c1, c2) => c1.x - c2.x);
    // winding(x) = sum of dir over crossings strictly right of x
    let total = 0;
    for (const c of crossings) total += c.dir;

    let passed = 0;
    let k = 0;
    for (let col = 0; col < box.width; col++) {
      const x = box.x + col;
      while (k < crossings.length && crossings[k].x <= x) {
        passed += crossings[k].dir;
        k++;
      }
      if (total - passed !== 0) cells[row * box.width + col] = 1;
    }
  }
}

/** Marks lattice points lying on the path's edges */
function markStroke(
  path: RegionPath,
  box: BoundingBox,
  cells: Uint8Array
): void {
  const mark = (x: number, y: number) => {
    const col = x - box.x;
    const row = y - box.y;
    if (col < 0 || row < 0 || col >= box.width || row >= box.height) return;
    cells[row * box.width + col] = 1;
  };

  // Loops stay inside the box however far an edge reaches past it
  const right = box.x + box.width - 1;
  const bottom = box.y + box.height - 1;

  for (let i = 0; i < path.length; i++) {
    const a = path[i];
    const b = path[(i + 1) % path.length];

    if (Math.abs(a.y - b.y) <= EPSILON) {
      if (Math.abs(a.y - Math.round(a.y)) > EPSILON) continue;
      const y = Math.round(a.y);
      if (y < box.y || y > bottom) continue;
      const fromX = Math.max(box.x, Math.ceil(Math.min(a.x, b.x) - EPSILON));
      const toX = Math.min(right, Math.floor(Math.max(a.x, b.x) + EPSILON));
      for (let x = fromX; x <= toX; x++) {
        mark(x, y);
      }
      continue;
    }

    const fromY = Math.max(box.y, Math.ceil(Math.min(a.y, b.y) - EPSILON));
    const toY = Math.min(bottom, Math.floor(Math.max(a.y, b.y) + EPSILON));
    for (let y = fromY; y <= toY; y++) {
      const x = a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y);
      const rounded = Math.round(x);
      if (Math.abs(x - rounded) <= EPSILON) mark(rounded, y);
    }
  }
}

// =============================================================================
// POINTER INPUT
// =============================================================================

/**
 * Accumulates one press → move… → release gesture.
 * Events before the press or after completion are ignored.
 */
export class RegionRecorder {
  private points: Point[] = [];
  private state: 'idle' | 'drawing' | 'done' = 'idle';

  handle(event: PointerEvent): SelectionOutcome | null {
    if (this.state === 'done') return null;

    switch (event.type) {
      case 'press':
        this.state = 'drawing';
        this.points = [{ x: event.x, y: event.y }];
        return null;
      case 'move':
        if (this.state === 'drawing') this.append({ x: event.x, y: event.y });
        return null;
      case 'release':
        if (this.state !== 'drawing') return null;
        if (event.x !== undefined && event.y !== undefined) {
          this.append({ x: event.x, y: event.y });
        }
        this.state = 'done';
        return this.finish();
      case 'abort':
        this.state = 'done';
        this.points = [];
        return { status: 'cancelled', reason: 'aborted' };
    }
  }

  get pointCount(): number {
    return this.points.length;
  }

  private append(p: Point): void {
    const last = this.points[this.points.length - 1];
    if (last && last.x === p.x && last.y === p.y) return;
    this.points.push(p);
  }

  private finish(): SelectionOutcome {
    if (isDegeneratePath(this.points)) {
      return { status: 'cancelled', reason: 'degenerate' };
    }
    const path = [...this.points];
    return { status: 'selected', path, bounds: boundingBoxOf(path) };
  }
}

/** Feeds events until one completes the gesture; end of input cancels. */
export function recordSelection(events: Iterable<PointerEvent>): SelectionOutcome {
  const recorder = new RegionRecorder();
  for (const event of events) {
    const outcome = recorder.handle(event);
    if (outcome) return outcome;
  }
  return { status: 'cancelled', reason: 'dismissed' };
}

/**
 * Reads JSON-lines pointer events, e.g. `{"type":"move","x":10,"y":20}`.
 * Blank lines are skipped; an invalid line throws.
 */
export async function readPointerEvents(input: Readable): Promise<PointerEvent[]> {
  const events: PointerEvent[] = [];
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    const trimmed = line.trim();
    if (!trimmed) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new Error(`Invalid pointer event JSON on line ${lineNumber}`, {
        cause: error,
      });
    }
    const result = pointerEventSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(
        `Invalid pointer event on line ${lineNumber}: ${result.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    events.push(result.data);
  }

  return events;
}

/** Parses `"x,y x,y ..."` (whitespace or `;` separated pairs) */
export function parseRegionPath(input: string): Point[] {
  const pairs = input
    .split(/[\s;]+/)
    .map((s) => s.trim())
    .filter(Boolean);

  return pairs.map((pair) => {
    const [xs, ys, ...rest] = pair.split(',');
    const x = Number(xs);
    const y = Number(ys);
    if (!xs || !ys || rest.length > 0 || !Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error(`Invalid point "${pair}" (expected x,y)`);
    }
    return { x, y };
  });
}

export function rectanglePath(box: BoundingBox): Point[] {
  const right = box.x + box.width - 1;
  const bottom = box.y + box.height - 1;
  return [
    { x: box.x, y: box.y },
    { x: right, y: box.y },
    { x: right, y: bottom },
    { x: box.x, y: bottom },
  ];
}
