import path from 'node:path';
import type { StageContext } from '@pipeline/types';

/** Seconds elapsed since `start` (a `Date.now()` value), never negative. */
export function secondsSince(start: number): number {
  return Math.max(0, (Date.now() - start) / 1000);
}

/**
 * Path of a unit (or of the whole units tree) relative to the project root,
 * in the form the lint tools are given.
 */
export function scopePath(ctx: StageContext, unit?: string): string {
  if (!unit) {
    return `${ctx.config.unitsDir}/`;
  }
  return path.posix.join(ctx.config.unitsDir, unit);
}
