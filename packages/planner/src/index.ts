export { buildAdjacency, bfsTree, hopDistance, shortestPath, treePath } from "./bfs.js";
export type { Adjacency, AdjacencyOptions, BfsTree, PlanEdge } from "./bfs.js";
export { planPaths } from "./planner.js";
export type { CandidatePath, PlanOptions } from "./planner.js";
