export { Crawler } from "./crawler.js";
export type { CrawlerOptions, CrawlResult } from "./crawler.js";
export { Frontier } from "./frontier.js";
export type { FrontierEntry, NodeState } from "./frontier.js";
export { CrawlGraph } from "./crawl-graph.js";
export type { EdgeObservation } from "./crawl-graph.js";
export { collectNode } from "./observe.js";
export type { NodeObservation, CollectResult } from "./observe.js";
export { SummaryBuilder, formatRunSummary } from "./summary.js";
