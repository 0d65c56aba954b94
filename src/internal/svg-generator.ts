import type { CircleCenter } from '../types.js';
import type { EncodedShape } from '../encoded-shape.js';

/** Quadrant start angles in SVG degrees (y grows downward), quadrant 0 = upper right. */
const QUADRANT_SWEEPS: readonly [number, number][] = [
  [-90, 0],
  [0, 90],
  [90, 180],
  [180, 270],
];

function svgDocument(size: number, body: string[]): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">\n${body.join('\n')}\n</svg>`;
}

function opacity(density: number): string {
  return String(Math.round(Math.min(Math.max(density, 0), 1) * 1000) / 1000);
}

/**
 * Generate SVG string shading each grid map cell by its density.
 * Row 0 (lowest y) is drawn at the bottom.
 */
export function generateGridMapSvg(shape: EncodedShape, size: number): string {
  const grid = shape.gridMap();
  const precision = shape.precision;
  const cell = size / precision;
  const rects: string[] = [];

  for (let row = 0; row < precision; row++) {
    for (let col = 0; col < precision; col++) {
      const x = col * cell;
      const y = (precision - 1 - row) * cell;
      rects.push(
        `  <rect x="${x}" y="${y}" width="${cell}" height="${cell}" fill="rgba(40,90,200,${opacity(grid[row][col])})" stroke="rgba(128,128,128,0.8)" stroke-width="1" />`
      );
    }
  }

  return svgDocument(size, rects);
}

function polar(cx: number, cy: number, r: number, degrees: number): string {
  const rad = (degrees * Math.PI) / 180;
  const x = Math.round((cx + r * Math.cos(rad)) * 100) / 100;
  const y = Math.round((cy + r * Math.sin(rad)) * 100) / 100;
  return `${x},${y}`;
}

/** Generate SVG string shading each ring quadrant of a circle map by its density. */
export function generateCircleMapSvg(shape: EncodedShape, size: number, center: CircleCenter = 'median'): string {
  const circle = shape.circleMap(center);
  const rings = shape.precision;
  const c = size / 2;
  const ringWidth = c / rings;
  const paths: string[] = [];

  for (let ring = 0; ring < rings; ring++) {
    const inner = ring * ringWidth;
    const outer = (ring + 1) * ringWidth;

    for (let q = 0; q < QUADRANT_SWEEPS.length; q++) {
      const [from, to] = QUADRANT_SWEEPS[q];
      const d = inner === 0
        ? `M ${c},${c} L ${polar(c, c, outer, from)} A ${outer} ${outer} 0 0 1 ${polar(c, c, outer, to)} Z`
        : `M ${polar(c, c, inner, from)} L ${polar(c, c, outer, from)} A ${outer} ${outer} 0 0 1 ${polar(c, c, outer, to)} L ${polar(c, c, inner, to)} A ${inner} ${inner} 0 0 0 ${polar(c, c, inner, from)} Z`;
      paths.push(
        `  <path d="${d}" fill="rgba(200,90,40,${opacity(circle[ring][q])})" stroke="rgba(128,128,128,0.8)" stroke-width="1" />`
      );
    }
  }

  return svgDocument(size, paths);
}
