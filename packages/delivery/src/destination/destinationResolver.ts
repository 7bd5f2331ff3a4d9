/**
 * Destination Resolver
 *
 * Turns the subpath declared in a marker file into the concrete target
 * directory under the destination root:
 *
 *   destRoot / [year /] markerDestination [/ driveSuffix]
 *
 * Resolution is pure: no I/O, no hidden state. Creating the directory is
 * the caller's job.
 */

import { isAbsolute, join, normalize, relative, sep } from 'node:path';
import { DestinationResolutionError } from '@dropsort/core';
import type { DestinationConfig } from '@dropsort/core';

const YEAR_PATTERN = /(19\d{2}|20\d{2})/;

export interface ResolvedTarget {
  // Absolute target directory
  path: string;
  // Normalized marker destination
  subpath: string;
  year: string | null;
  warnings: string[];
}

/**
 * Leftmost 19xx/20xx run in a path string
 */
export function extractYear(pathString: string): string | null {
  const match = YEAR_PATTERN.exec(pathString);
  return match?.[1] ?? null;
}

function escapesRoot(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

export function resolveDestination(
  markerDestination: string,
  config: DestinationConfig
): ResolvedTarget {
  const trimmed = markerDestination.trim();

  if (trimmed.length === 0) {
    throw new DestinationResolutionError(markerDestination, 'destination is empty');
  }
  if (trimmed.includes('\0')) {
    throw new DestinationResolutionError(markerDestination, 'destination contains a NUL byte');
  }

  // Marker paths are always relative to the destination root
  const subpath = normalize(trimmed).replace(/^[/\\]+/, '');
  if (subpath.length === 0) {
    throw new DestinationResolutionError(markerDestination, 'destination is empty');
  }

  const root = normalize(config.root);
  const warnings: string[] = [];
  let year: string | null = null;
  let base: string;

  if (config.yearPrefix) {
    year = extractYear(subpath);
    if (year) {
      base = join(root, year, subpath);
    } else {
      warnings.push(`No valid year found in path: ${subpath}, using standard path`);
      base = join(root, subpath);
    }
  } else {
    base = join(root, subpath);
  }

  const target = normalize(
    config.driveSuffix.enabled ? join(base, config.driveSuffix.segment) : base
  );

  if (escapesRoot(root, target)) {
    throw new DestinationResolutionError(markerDestination, `resolves outside ${root}`);
  }

  return { path: target, subpath, year, warnings };
}

export class DestinationResolver {
  constructor(private readonly config: DestinationConfig) {}

  resolve(markerDestination: string): ResolvedTarget {
    return resolveDestination(markerDestination, this.config);
  }
}
