/**
 * markdown-structural-nav
 *
 * Structural index and cursor navigation for Markdown text buffers
 *
 * ## Recommended API (use these):
 * - MarkdownNavigator - Cached per-document navigation (category jumps, block boundaries, table cells)
 * - loadKeyBindings, findBinding, describeNoMatch, describeTarget - Single-key table and announcements
 * - computeRevision - Content hash usable as a snapshot revision
 *
 * ## Building blocks:
 * - classifyLines, extractElements, StructuralIndex, resolveGrid
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

// Element model and errors
export * from './base/index.js';

// Navigation facade
export * from './navigation/index.js';

// =============================================================================
// BUILDING BLOCKS - Usable on their own
// =============================================================================

export * from './tokenizer/index.js';
export * from './extraction/index.js';
export * from './structural-index/index.js';
export * from './table-grid/index.js';
