export { MoveScorer, SCORED_KINDS } from './MoveScorer.js';
export { MoveOrderer } from './MoveOrderer.js';
