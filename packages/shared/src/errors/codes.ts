// ============================================
// Shellmark Error Codes
// ============================================

/**
 * Centralized error codes.
 * Error code ranges:
 * - 3xxx: Template format errors
 * - 4xxx: Detection/probe errors
 */
export enum ErrorCode {
  // Format Errors (3xxx)
  FORMAT_SYNTAX = 3001,
  FORMAT_UNKNOWN_VARIABLE = 3002,
  FORMAT_UNKNOWN_STYLE = 3003,
  FORMAT_UNRESOLVED_META = 3004,
  FORMAT_RESOLVER_VALUE = 3005,
  STYLE_INVALID = 3006,

  // Probe Errors (4xxx)
  PROBE_READ_FAILED = 4001,
}
