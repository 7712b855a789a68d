import type { BreakdownEntry, PieSlice } from '@charity-ledger/shared';

const PALETTE: [number, number, number][] = [
  [31, 119, 180],
  [255, 127, 14],
  [44, 160, 44],
  [214, 39, 40],
  [148, 103, 189],
  [140, 86, 75],
  [227, 119, 194],
  [127, 127, 127],
  [188, 189, 34],
  [23, 190, 207],
];

const FULL_TURN = Math.PI * 2;

export interface Point {
  x: number;
  y: number;
}

// Slices start at 12 o'clock and run clockwise. Non-positive amounts are left out.
export function computePieSlices(entries: BreakdownEntry[]): PieSlice[] {
  const positive = entries.filter((entry) => entry.amount > 0);
  const total = positive.reduce((sum, entry) => sum + entry.amount, 0);
  if (total <= 0) {
    return [];
  }

  let angle = 0;
  return positive.map((entry, index) => {
    const share = entry.amount / total;
    const startAngle = angle;
    angle = index === positive.length - 1 ? FULL_TURN : angle + share * FULL_TURN;
    return {
      label: entry.label,
      amount: entry.amount,
      share,
      startAngle,
      endAngle: angle,
      color: PALETTE[index % PALETTE.length],
    };
  });
}

// Page coordinates grow downwards, so clockwise from 12 o'clock is (sin, -cos).
export function pointOnCircle(center: Point, radius: number, angle: number): Point {
  return {
    x: center.x + radius * Math.sin(angle),
    y: center.y - radius * Math.cos(angle),
  };
}

// Closed outline of a slice: the centre, then the arc sampled every `step` radians.
export function slicePolygon(slice: PieSlice, center: Point, radius: number, step = Math.PI / 36): Point[] {
  const sweep = slice.endAngle - slice.startAngle;
  const segments = Math.max(1, Math.ceil(sweep / step));
  const points: Point[] = [{ ...center }];
  for (let index = 0; index <= segments; index += 1) {
    points.push(pointOnCircle(center, radius, slice.startAngle + (sweep * index) / segments));
  }
  return points;
}

export function formatShare(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}
