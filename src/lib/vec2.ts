import type { RandomSource } from './random.ts';

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export const ORIGIN: Vec2 = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function fromPolar(angle: number, radius: number): Vec2 {
  return { x: Math.cos(angle) * radius, y: Math.sin(angle) * radius };
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Uniform point inside a disc of `radius` around the origin. */
export function randomInsideCircle(radius: number, random: RandomSource): Vec2 {
  if (radius <= 0) {
    return ORIGIN;
  }
  const angle = random() * Math.PI * 2;
  const length = Math.sqrt(random()) * radius;
  return fromPolar(angle, length);
}
