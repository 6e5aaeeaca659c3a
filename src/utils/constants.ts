/**
 * Constants and Configuration Values
 */

import type { ReportFormat } from '../types';

// ============================================================================
// ANALYSIS CONFIGURATION
// ============================================================================

export const HOURS_PER_DAY = 24;
export const DEFAULT_SCALE = 1;

// Words are split on this exact character, repeated separators yield empty words
export const WORD_SEPARATOR = ' ';

// ============================================================================
// REGEX PATTERNS
// ============================================================================

// "2023-04-01T18:22:05", optionally with fractional seconds; always UTC
export const MESSAGE_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d{1,9})?$/;

export const CALENDAR_DATE_SEPARATOR = '/';
export const INTEGER_REGEX = /^[+-]?\d+$/;

// ============================================================================
// REPORT LAYOUT
// ============================================================================

export const REPORT_FORMAT: ReportFormat = Object.freeze({
    marker: '•',
    countSeparator: '⨉',
    hourLabelDigits: 2,
    jsonIndent: 2
});
