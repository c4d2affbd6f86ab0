/**
 * @fileoverview Mutation engine barrel export
 * @module lib/text-mutation
 */

export { deleteSection } from './delete-section'
export { insertPayload, PAYLOAD_SEPARATOR } from './insert-payload'
export { removeContent } from './content-patterns'
export type {
  ContentRemoval,
  DeletionFailure,
  DeletionFailureReason,
  DeletionResult,
  InsertionResult,
  MutationOperation,
  MutationResult,
} from './types'
