/**
 * @fileoverview Section detection barrel export
 * @module lib/section-detection
 */

export * from './types'
export {
  headingRule,
  createHeadingRegistry,
  register,
  matchHeading,
  DEFAULT_HEADING_REGISTRY,
  type HeadingRegistry,
} from './heading-registry'
export { LineOffsetIndex, createDocument } from './line-offset-index'
export { locateSection } from './section-locator'
export { isTopLevelHeading, resolveSectionEnd, resolveSectionSpan } from './section-range'
export { estimateSectionOffset } from './fallback-estimator'
export {
  DETECTION_DEFAULTS,
  resolveMutationOptions,
  type MutationOptions,
  type ResolvedMutationOptions,
} from './config'
