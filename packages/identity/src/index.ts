export { EvidenceStore } from "./evidence.js";
export {
  resolveIdentity, tally, leaders, breakTie,
  forcedStage, routesConsensusStage, advertisedStage, routesTieBreakStage, aliasStage, mheardStage,
  DEFAULT_STAGES,
} from "./resolver.js";
export type {
  IdentityResolution, IdentityStage, ResolveContext, ResolutionConfidence, ResolutionSource,
} from "./resolver.js";
