export {
  parseCallsignToken, formatCallsign, baseOf, parseCanonicalId, isValidBase, isValidSsid, MAX_SSID,
} from "./callsign.js";
export type { CallsignParse, CallsignRejection } from "./callsign.js";
export { splitResponse, stripBanner, isPlausible } from "./text.js";
export type { Banner, ParseResult, RejectedEntry } from "./text.js";
export { parseRoutes } from "./routes.js";
export type { RouteEntry, RoutesResult } from "./routes.js";
export { parseNodes } from "./nodes.js";
export type { NodeAlias, NodesResult } from "./nodes.js";
export { parseMheard } from "./mheard.js";
export type { MheardEntry, MheardResult } from "./mheard.js";
export { parsePorts, classifyLink } from "./ports.js";
export type { PortsResult } from "./ports.js";
export { parseInfo, parseLocation, parseApplications, detectNodeType } from "./info.js";
export type { InfoResult } from "./info.js";
export { parseCommands } from "./commands.js";
export {
  classifyConnectResponse, isPrompt, isUsernamePrompt, isPasswordPrompt, isLoginFailure,
} from "./connect.js";
export type { ConnectClassification } from "./connect.js";

import type { RoutesResult } from "./routes.js";
import type { NodesResult } from "./nodes.js";
import type { MheardResult } from "./mheard.js";
import type { PortsResult } from "./ports.js";

/** Tagged union of every table-shaped command output. */
export type CommandOutput = RoutesResult | NodesResult | MheardResult | PortsResult;
