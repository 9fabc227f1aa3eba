import { stripBanner } from "./text.js";

const COMMAND_WORD = /^[A-Z][A-Z0-9]{0,9}$/;

/**
 * Parse `?` output into the node's command list. Lines are not run through
 * the section-header filter: a command list may well start with NODES.
 */
export function parseCommands(raw: string): string[] {
  const commands: string[] = [];
  for (const line of raw.replace(/\r\n?/g, "\n").split("\n")) {
    for (const word of stripBanner(line).trim().split(/\s+/)) {
      const cmd = word.replace(/[.,;:]+$/, "");
      if (COMMAND_WORD.test(cmd) && !commands.includes(cmd)) commands.push(cmd);
    }
  }
  return commands;
}
