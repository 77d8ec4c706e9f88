/**
 * @aligner/core
 * 
 * Core package containing:
 * - Error handling
 * - Report accumulation for conversions
 */

// Errors
export { 
  AlignerError,
  ValidationError,
  XmlParseError,
  type XmlParseErrorKind,
} from './errors/index.js';

// Reports
export {
  Result,
  collect,
  type ReportSink,
  type Outcome,
} from './result.js';
