/**
 * Extractor Registry
 *
 * Registry pattern for layout extractors.
 * Allows registering extractors for each layout and retrieving them.
 */

import type { Layout } from '../types';
import type { LayoutExtractor } from './types';
import { logger } from '../logger';

/**
 * Map of layouts to their extractors
 */
const extractorRegistry = new Map<Layout, LayoutExtractor>();

/**
 * Register an extractor for a layout.
 * Overwrites any existing extractor for that layout.
 */
export function registerExtractor(extractor: LayoutExtractor): void {
  extractorRegistry.set(extractor.layout, extractor);

  logger.debug('Registered extractor', {
    layout: extractor.layout,
    kind: extractor.kind,
    description: extractor.description,
  });
}

/**
 * Get the extractor for a layout, throwing if not found.
 */
export function getExtractorOrThrow(layout: Layout): LayoutExtractor {
  const extractor = extractorRegistry.get(layout);
  if (!extractor) {
    throw new Error(`No extractor registered for layout: ${layout}`);
  }
  return extractor;
}

export function getRegisteredLayouts(): Layout[] {
  return Array.from(extractorRegistry.keys());
}
