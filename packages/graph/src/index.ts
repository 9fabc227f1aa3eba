export { GraphStore, partialPath } from "./store.js";
export {
  mergeNode, mergeEdges, combineDocuments, mergeDocuments, applySession,
} from "./merge.js";
export type { MergeInput, MergeOptions, MergeResult, GraphDelta } from "./merge.js";
export { emptyDocument, emptyNode, withTotals, linkKey, sortedUnion } from "./document.js";
export { exportCsv, CSV_HEADER } from "./csv.js";
export type { CsvOptions } from "./csv.js";
export { isExcluded, queryNodes, visibleEdges, formatSummaryTable } from "./query.js";
export type { NodeFilter, EdgeFilter } from "./query.js";
