/**
 * Centralized constants for @tangle/core.
 * This file contains all magic numbers and configuration defaults.
 */

import type { Thresholds } from './config/schema.js';

// Default limits; a metric strictly above its limit is flagged
export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  cyclomaticLimit: 10,
  cognitiveLimit: 15,
  nestingLimit: 3,
  lineLimit: 50,
});

// Files loaded at once by the CLI
export const DEFAULT_CONCURRENCY = 8;

// Extract Function: share of a unit's lines a block or statement run must exceed
export const EXTRACT_SPAN_RATIO = 0.4;

// Invert Expression: largest number of distinct atoms the minimizer handles
export const MAX_BOOLEAN_ATOMS = 6;

// Table-Driven: fewest branches that make a lookup table worthwhile
export const MIN_TABLE_BRANCHES = 3;

// Consolidate Conditional: fewest consecutive ifs to merge
export const MIN_CONSOLIDATE_RUN = 2;

// Guard Clause: nesting the wrapped remainder must reach
export const MIN_GUARD_NESTING = 2;

// Use Scoped Cleanup: fewest early returns that each repeat the release
export const MIN_CLEANUP_RETURNS = 2;
