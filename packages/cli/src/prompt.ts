import * as readline from "node:readline";
import type { Credentials } from "@pktmap/schemas";

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

function ask(io: PromptIO, question: string): Promise<string> {
  const rl = readline.createInterface({ input: io.input, output: io.output, terminal: false });
  return new Promise<string>((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Credential source for sessions that hit a login prompt. Missing fields
 * are asked for once per run; every later session reuses the answers.
 */
export function createCredentialPrompt(
  known: Credentials,
  io: PromptIO = { input: process.stdin, output: process.stdout },
): () => Promise<Credentials> {
  let pending: Promise<Credentials> | undefined;
  return () => {
    if (!pending) {
      pending = (async () => {
        const credentials: Credentials = { ...known };
        if (credentials.username === undefined) credentials.username = await ask(io, "Username: ");
        if (credentials.password === undefined) credentials.password = await ask(io, "Password: ");
        return credentials;
      })();
    }
    return pending;
  };
}
