/**
 * `chat-ledger chat` command.
 * Sends messages to the conversation engine as one chat user and prints the replies.
 * With text after the command, handles that single message; otherwise runs a REPL.
 */

import * as readline from "readline";
import { createDefaultEngineDeps, createEngine, type ConversationEngine } from "../../conversation/engine";

export const DEFAULT_USER = "local";

export interface ChatDeps {
  engine: ConversationEngine;
  readLine: () => Promise<string | null>;
  writeLine: (text: string) => void;
  close?: () => void;
}

export interface ChatArgs {
  userId: string;
  message: string;
}

export function parseChatArgs(args: string[]): ChatArgs {
  let userId = DEFAULT_USER;
  const words: string[] = [];
  for (const arg of args) {
    if (arg.startsWith("--user=")) {
      userId = arg.slice("--user=".length) || DEFAULT_USER;
    } else if (!arg.startsWith("--")) {
      words.push(arg);
    }
  }
  return { userId, message: words.join(" ") };
}

function createDefaultDeps(): ChatDeps {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    engine: createEngine(createDefaultEngineDeps()),
    readLine: () =>
      new Promise<string | null>((resolve) => {
        if (closed) {
          resolve(null);
          return;
        }
        rl.question("tú> ", (answer) => resolve(answer));
        rl.once("close", () => resolve(null));
      }),
    writeLine: (text: string) => console.log(text),
    close: () => rl.close(),
  };
}

export async function chatCommand(args: string[], deps?: ChatDeps): Promise<void> {
  const { engine, readLine, writeLine, close } = deps ?? createDefaultDeps();
  const { userId, message } = parseChatArgs(args);

  try {
    if (message) {
      for (const reply of await engine.handleMessage(userId, message)) writeLine(reply);
      return;
    }

    writeLine(`Chat ledger (usuario ${userId}). Escribe "salir" para terminar.\n`);
    while (true) {
      const input = await readLine();
      if (input === null) break;

      const trimmed = input.trim();
      if (!trimmed) continue;
      if (trimmed === "salir" || trimmed === "exit" || trimmed === "quit") break;

      for (const reply of await engine.handleMessage(userId, trimmed)) writeLine(`\n${reply}\n`);
    }
    writeLine("¡Hasta luego!");
  } finally {
    close?.();
  }
}
