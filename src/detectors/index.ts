/**
 * Pattern Detectors - central exports
 */

export type { PatternDetector } from './PatternDetector.js';
export { geometryFor, moverOf, sortMatches } from './PatternDetector.js';
export { findLineTriples } from './lineTriples.js';
export type { LineTriple } from './lineTriples.js';

export { AbsolutePinDetector } from './AbsolutePinDetector.js';
export { RelativePinDetector } from './RelativePinDetector.js';
export { ForkDetector } from './ForkDetector.js';
export { SkewerDetector } from './SkewerDetector.js';
export { CaptureDetector } from './CaptureDetector.js';
export { PromotionDetector } from './PromotionDetector.js';
