/**
 * Layout Extractors Module
 *
 * One extractor per classified layout, each a pure function of the page
 * text and the project/provider context.
 */

// Core types and interfaces
export type {
  LayoutExtractor,
  ExtractionContext,
  RawExtraction,
  RawField,
} from './types';
export { emptyExtraction } from './types';

// Base class
export { BaseExtractor } from './base-extractor';

// Registry
export { registerExtractor, getExtractorOrThrow, getRegisteredLayouts } from './registry';

// Text orientation
export {
  normalizeTextOrientation,
  isReversedText,
  reverseText,
  orientationScores,
} from './text-orientation';

// Patterns (exported for testing)
export {
  extractDocumentNumber,
  extractInvoiceCompetence,
  extractServiceTotalsRow,
  extractInlineTotal,
  extractLabelledTotal,
  extractIssBlock,
  extractSecurityIss,
  extractInss,
  extractSupersedeReference,
  detectServiceCategory,
} from './invoice-patterns';
export {
  extractPayrollCompetence,
  scanTenantWorkerCounts,
  selectWorkerCount,
  extractClassicWorkerCount,
  extractGuideRow,
  type TenantScan,
  type TenantWorkerCount,
  type WorkerCountSelection,
} from './payroll-patterns';
export { findMoneyValues, splitLines, combinedText } from './text-utils';

// Individual extractors
export { StandardInvoiceExtractor, standardInvoiceExtractor } from './standard-invoice';
export { InlineLegacyInvoiceExtractor, inlineLegacyInvoiceExtractor } from './inline-legacy-invoice';
export { SecurityServiceInvoiceExtractor, securityServiceInvoiceExtractor } from './security-service-invoice';
export { ClassicPayrollSummaryExtractor, classicPayrollSummaryExtractor } from './classic-payroll-summary';
export { FgtsGuideDetailExtractor, fgtsGuideDetailExtractor } from './fgts-guide-detail';
export { FgtsDigitalGuideExtractor, fgtsDigitalGuideExtractor } from './fgts-digital-guide';

// Import for registration
import { registerExtractor } from './registry';
import { standardInvoiceExtractor } from './standard-invoice';
import { inlineLegacyInvoiceExtractor } from './inline-legacy-invoice';
import { securityServiceInvoiceExtractor } from './security-service-invoice';
import { classicPayrollSummaryExtractor } from './classic-payroll-summary';
import { fgtsGuideDetailExtractor } from './fgts-guide-detail';
import { fgtsDigitalGuideExtractor } from './fgts-digital-guide';

/**
 * Register all built-in extractors.
 * Call this at application startup.
 */
export function registerAllExtractors(): void {
  registerExtractor(standardInvoiceExtractor);
  registerExtractor(inlineLegacyInvoiceExtractor);
  registerExtractor(securityServiceInvoiceExtractor);
  registerExtractor(classicPayrollSummaryExtractor);
  registerExtractor(fgtsGuideDetailExtractor);
  registerExtractor(fgtsDigitalGuideExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
