/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Holder of the learned arbitration profile.
 *
 * Readers get a frozen snapshot; writers replace it whole. Updates run one
 * at a time through a promise chain so two learning steps never interleave.
 *
 * The profile persists to an optional JSON sidecar holding exactly four
 * floats:
 *
 * ```json
 * { "base": 0.3, "episodic": 0.2, "procedural": 0.3, "abstraction": 0.2 }
 * ```
 *
 * The sidecar is safe to delete. A missing or corrupt file means the
 * uniform profile. Entries below the floor are projected back onto it.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { debugLogger } from '../../utils/debugLogger.js';
import { isRecord } from '../normalize.js';
import { PROVENANCE_CLASSES, type ArbitrationProfile } from '../types.js';
import {
  DEFAULT_CLASS_FLOOR,
  mapClasses,
  normalizeClassWeights,
  projectAboveFloor,
  uniformClassWeights,
  type ClassWeights,
} from './provenance.js';

/**
 * Normalize, lift every class to at least `floor`, and freeze.
 */
export function freezeProfile(
  weights: Readonly<ClassWeights>,
  floor = 0,
): ArbitrationProfile {
  return Object.freeze(
    projectAboveFloor(normalizeClassWeights(weights), floor),
  );
}

/**
 * Parse sidecar contents. Returns undefined unless every class has a
 * finite, non-negative value and at least one is positive.
 */
export function parseProfile(raw: unknown): ClassWeights | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const values: Partial<ClassWeights> = {};
  for (const cls of PROVENANCE_CLASSES) {
    const value = raw[cls];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      return undefined;
    }
    values[cls] = value;
  }
  const weights = mapClasses((cls) => values[cls] ?? 0);
  if (PROVENANCE_CLASSES.every((cls) => weights[cls] === 0)) {
    return undefined;
  }
  return weights;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export class ArbitrationProfileStore {
  private snapshot: ArbitrationProfile = freezeProfile(uniformClassWeights());
  private pending: Promise<unknown> = Promise.resolve();

  /**
   * @param profilePath - Sidecar location; without one the profile lives
   *   in memory only
   * @param floor - Minimum weight of every class in a loaded or updated
   *   profile
   */
  constructor(
    private readonly profilePath?: string,
    private readonly floor: number = DEFAULT_CLASS_FLOOR,
  ) {}

  get(): ArbitrationProfile {
    return this.snapshot;
  }

  getPath(): string | undefined {
    return this.profilePath;
  }

  /**
   * Read the sidecar, replacing the snapshot. Never throws.
   */
  async load(): Promise<ArbitrationProfile> {
    if (!this.profilePath) {
      return this.snapshot;
    }
    let text: string;
    try {
      text = await readFile(this.profilePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        debugLogger.log(
          `ArbitrationProfileStore: No profile at ${this.profilePath}, using uniform weights`,
        );
      } else {
        debugLogger.warn(
          `ArbitrationProfileStore: Failed to read ${this.profilePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
      this.snapshot = freezeProfile(uniformClassWeights());
      return this.snapshot;
    }

    let parsed: ClassWeights | undefined;
    try {
      parsed = parseProfile(JSON.parse(text));
    } catch (error) {
      debugLogger.warn(
        `ArbitrationProfileStore: Corrupt profile at ${this.profilePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    if (!parsed) {
      debugLogger.warn(
        `ArbitrationProfileStore: Ignoring invalid profile at ${this.profilePath}`,
      );
    }
    this.snapshot = freezeProfile(parsed ?? uniformClassWeights(), this.floor);
    return this.snapshot;
  }

  /**
   * Compute and install a new profile from the current one.
   *
   * Calls are serialized. The new snapshot is installed before the
   * sidecar is written; a failed write is logged and the in-memory
   * profile stays.
   */
  update(
    next: (current: ArbitrationProfile) => Readonly<ClassWeights>,
  ): Promise<ArbitrationProfile> {
    const run = this.pending.then(async () => {
      this.snapshot = freezeProfile(next(this.snapshot), this.floor);
      await this.persist(this.snapshot);
      return this.snapshot;
    });
    // Keep the chain alive after a rejected update; the caller still sees it
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async persist(profile: ArbitrationProfile): Promise<void> {
    if (!this.profilePath) {
      return;
    }
    const tmpPath = `${this.profilePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.profilePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(profile, null, 2), 'utf8');
      await rename(tmpPath, this.profilePath);
      debugLogger.log(
        `ArbitrationProfileStore: Saved profile to ${this.profilePath}`,
      );
    } catch (error) {
      debugLogger.warn(
        `ArbitrationProfileStore: Failed to save profile: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
