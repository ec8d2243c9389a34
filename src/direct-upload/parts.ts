/**
 * Part list helpers for multipart completion
 * @module dataverse-direct-upload/direct-upload/parts
 */

import { PackagingError } from '../errors/index.js';
import type { CompletedPart } from './interface.js';

/**
 * Checks that parts are numbered 1..N, in ascending order, each with an ETag.
 *
 * @throws {PackagingError} On an empty list, a gap, a duplicate, disorder or a missing ETag
 */
export function validatePartsSequence(parts: readonly CompletedPart[]): void {
  if (parts.length === 0) {
    throw PackagingError.invalidPartOrder('Parts array cannot be empty');
  }

  parts.forEach((part, i) => {
    const expectedPartNumber = i + 1;
    if (part.partNumber !== expectedPartNumber) {
      throw PackagingError.invalidPartOrder(
        `Parts must be numbered sequentially starting from 1. Expected part ${expectedPartNumber}, got ${part.partNumber}`
      );
    }
    if (!part.eTag) {
      throw PackagingError.invalidPartOrder(`Part ${part.partNumber} has no ETag`);
    }
  });
}

/**
 * Renders the completion payload: `{"1": etag1, "2": etag2, ...}`
 */
export function buildCompletionBody(parts: readonly CompletedPart[]): string {
  validatePartsSequence(parts);
  const body: Record<string, string> = {};
  for (const part of parts) {
    body[String(part.partNumber)] = part.eTag;
  }
  return JSON.stringify(body);
}
