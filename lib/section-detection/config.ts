/**
 * @fileoverview Engine defaults and option validation
 * @module lib/section-detection/config
 */

import { z } from 'zod'
import { ValidationError } from '@/lib/errors'
import { DEFAULT_HEADING_REGISTRY, type HeadingRegistry } from './heading-registry'
import type { InsertionPosition } from './types'

/** Default knobs for locating, estimating and mutating. */
export const DETECTION_DEFAULTS = {
  /** Max distance an offset is moved forward to reach a newline */
  snapWindow: 300,
  /** Fraction of a section body after which a payload is inserted */
  insertionDepth: 0.7,
  /** Deletions leaving fewer trimmed characters than this are rejected */
  minResultLength: 50,
  /** Where a section is assumed to sit when its heading is missing */
  fallbackPositions: {
    ABSTRACT: 0.05,
    INTRODUCTION: 0.15,
    METHODS: 0.35,
    EXPERIMENTS: 0.65,
    CONCLUSION: 0.9,
  },
} as const

export interface MutationOptions {
  registry?: HeadingRegistry
  snapWindow?: number
  insertionDepth?: number
  minResultLength?: number
  fallbackPositions?: Partial<Record<InsertionPosition, number>>
}

export interface ResolvedMutationOptions {
  registry: HeadingRegistry
  snapWindow: number
  insertionDepth: number
  minResultLength: number
  fallbackPositions: Record<InsertionPosition, number>
}

const fraction = z.number().min(0).max(1)

const MutationOptionsSchema = z.object({
  snapWindow: z.number().int().nonnegative().default(DETECTION_DEFAULTS.snapWindow),
  insertionDepth: fraction.default(DETECTION_DEFAULTS.insertionDepth),
  minResultLength: z.number().int().nonnegative().default(DETECTION_DEFAULTS.minResultLength),
  fallbackPositions: z
    .object({
      ABSTRACT: fraction.optional(),
      INTRODUCTION: fraction.optional(),
      METHODS: fraction.optional(),
      EXPERIMENTS: fraction.optional(),
      CONCLUSION: fraction.optional(),
    })
    .default({}),
})

/**
 * Fills in defaults and validates numeric options.
 *
 * @throws {ValidationError} for a negative window or a fraction outside [0, 1]
 */
export function resolveMutationOptions(options: MutationOptions = {}): ResolvedMutationOptions {
  const { registry, ...numeric } = options
  const parsed = MutationOptionsSchema.safeParse(numeric)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }

  const overrides = parsed.data.fallbackPositions
  return {
    registry: registry ?? DEFAULT_HEADING_REGISTRY,
    snapWindow: parsed.data.snapWindow,
    insertionDepth: parsed.data.insertionDepth,
    minResultLength: parsed.data.minResultLength,
    fallbackPositions: {
      ABSTRACT: overrides.ABSTRACT ?? DETECTION_DEFAULTS.fallbackPositions.ABSTRACT,
      INTRODUCTION: overrides.INTRODUCTION ?? DETECTION_DEFAULTS.fallbackPositions.INTRODUCTION,
      METHODS: overrides.METHODS ?? DETECTION_DEFAULTS.fallbackPositions.METHODS,
      EXPERIMENTS: overrides.EXPERIMENTS ?? DETECTION_DEFAULTS.fallbackPositions.EXPERIMENTS,
      CONCLUSION: overrides.CONCLUSION ?? DETECTION_DEFAULTS.fallbackPositions.CONCLUSION,
    },
  }
}
