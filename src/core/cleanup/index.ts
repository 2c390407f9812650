/**
 * Cleanup module exports
 */

export { enforceRetention, getPruneCandidates, type PruneSelection } from "./retention";
