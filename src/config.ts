import { z } from 'zod';
import * as errors from './errors.js';

/**
 * Tolerances and scale shared by shape generation and every tolerance-sensitive
 * query. Passed explicitly; no kernel function reads a global default.
 */
export interface Configuration {
  /** Scale factor for the canonical shapes: a small triangle has legs of length `unit`. */
  readonly unit: number;
  /** Per-axis tolerance for vertex matching and tolerance-aware hashing. */
  readonly vertexTolerance: number;
  /** Segments shorter than this are treated as points. */
  readonly minVertexSeparation: number;
  /** Rotation snap increment in radians. */
  readonly rotationSnap: number;
}

const positiveNumber = z.number().finite().positive();

export const configurationSchema = z.object({
  unit: positiveNumber,
  vertexTolerance: positiveNumber,
  minVertexSeparation: positiveNumber,
  rotationSnap: positiveNumber,
});

/**
 * Stock values: 50pt unit, 8pt vertex tolerance, 3pt minimum separation, 15° snap.
 */
export const DEFAULT_CONFIGURATION: Configuration = Object.freeze({
  unit: 50,
  vertexTolerance: 8,
  minVertexSeparation: 3,
  rotationSnap: Math.PI / 12,
});

/**
 * Environment variable names read by `loadConfiguration`.
 */
export const CONFIGURATION_ENV = {
  unit: 'TANGRAM_UNIT',
  vertexTolerance: 'TANGRAM_VERTEX_TOLERANCE',
  minVertexSeparation: 'TANGRAM_MIN_VERTEX_SEPARATION',
  rotationSnap: 'TANGRAM_ROTATION_SNAP',
} as const satisfies Record<keyof Configuration, string>;

/**
 * Merges `overrides` onto the defaults and validates the result.
 * Throws `InvalidConfiguration` if any field is not a finite positive number.
 */
export function createConfiguration(overrides: Partial<Configuration> = {}): Configuration {
  const merged = {
    unit: overrides.unit ?? DEFAULT_CONFIGURATION.unit,
    vertexTolerance: overrides.vertexTolerance ?? DEFAULT_CONFIGURATION.vertexTolerance,
    minVertexSeparation: overrides.minVertexSeparation ?? DEFAULT_CONFIGURATION.minVertexSeparation,
    rotationSnap: overrides.rotationSnap ?? DEFAULT_CONFIGURATION.rotationSnap,
  };

  const result = configurationSchema.safeParse(merged);
  if (!result.success) {
    throw errors.invalidConfiguration(errors.describeIssues(result.error));
  }
  return Object.freeze(result.data);
}

function readNumber(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // Unparseable text becomes NaN and is rejected by the schema
  return Number(raw);
}

/**
 * Builds a configuration from environment variables, using defaults for unset ones.
 * The environment is passed in by the caller (the server entry passes `process.env`).
 */
export function loadConfiguration(env: Record<string, string | undefined>): Configuration {
  return createConfiguration({
    unit: readNumber(env, CONFIGURATION_ENV.unit),
    vertexTolerance: readNumber(env, CONFIGURATION_ENV.vertexTolerance),
    minVertexSeparation: readNumber(env, CONFIGURATION_ENV.minVertexSeparation),
    rotationSnap: readNumber(env, CONFIGURATION_ENV.rotationSnap),
  });
}
