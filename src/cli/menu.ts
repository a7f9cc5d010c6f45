import { createInterface } from "readline/promises";
import { OperatorInterrupt, describeError } from "../types/errors";
import type { SessionReport } from "../types/outcome";
import { createLogger, type Logger } from "../logging/logger";

export type Ask = (question: string) => Promise<string>;
export type Print = (line: string) => void;

const HOUR_MS = 60 * 60 * 1000;
export const INTERVAL_HOURS = [1, 2, 3, 4, 5];

/**
 * Ask on the terminal with a short-lived readline interface. Keeping none
 * open between prompts leaves Ctrl+C to the process during waits.
 */
export const terminalAsk: Ask = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/**
 * Re-ask until the answer is an integer, and one of `allowed` when given.
 */
export async function promptInt(
  ask: Ask,
  question: string,
  allowed?: readonly number[],
  print: Print = console.log,
): Promise<number> {
  for (;;) {
    const answer = (await ask(question)).trim();
    const value = /^-?\d+$/.test(answer) ? Number(answer) : NaN;
    if (Number.isNaN(value)) {
      print("Please enter a whole number.");
      continue;
    }
    if (allowed && !allowed.includes(value)) {
      print(`Please enter one of: ${allowed.join(", ")}.`);
      continue;
    }
    return value;
  }
}

export type Unsubscribe = () => void;
export type InterruptSource = (onInterrupt: () => void) => Unsubscribe;

export const sigintSource: InterruptSource = (onInterrupt) => {
  process.once("SIGINT", onInterrupt);
  return () => process.off("SIGINT", onInterrupt);
};

/**
 * Resolve after `ms`, or reject with {@link OperatorInterrupt} as soon as
 * the source fires.
 */
export function waitInterruptibly(ms: number, source: InterruptSource = sigintSource): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      unsubscribe();
      resolve();
    }, ms);
    const unsubscribe = source(() => {
      clearTimeout(timer);
      reject(new OperatorInterrupt("Wait interrupted", { waitedForMs: ms }));
    });
  });
}

export interface MenuDeps {
  ask: Ask;
  runSession: () => Promise<SessionReport>;
  wait?: (ms: number) => Promise<void>;
  print?: Print;
  log?: Logger;
}

type Mode = "single" | "repeat";

/**
 * The operator loop: pick single or repeated sessions, run them, and handle
 * session errors and interrupted waits. Returns when the operator stops.
 */
export async function runMenuLoop(deps: MenuDeps): Promise<void> {
  const { ask, runSession } = deps;
  const wait = deps.wait ?? ((ms: number) => waitInterruptibly(ms));
  const print = deps.print ?? console.log;
  const log = deps.log ?? createLogger("menu");

  for (;;) {
    print("\nChoose a mode:");
    print("1. Run once");
    print("2. Run every few hours");
    const mode: Mode = (await promptInt(ask, "Enter your choice (1-2): ", [1, 2], print)) === 1 ? "single" : "repeat";

    let hours = 0;
    if (mode === "repeat") {
      hours = await promptInt(ask, "Hours between sessions (1-5): ", INTERVAL_HOURS, print);
    }

    const next = await runSessions(mode, hours, { ask, runSession, wait, print, log });
    if (next === "stop") return;
  }
}

async function runSessions(
  mode: Mode,
  hours: number,
  deps: Required<MenuDeps>,
): Promise<"menu" | "stop"> {
  const { ask, runSession, wait, print, log } = deps;

  for (;;) {
    try {
      await runSession();
    } catch (error) {
      log.error(`Session failed: ${describeError(error)}`);
      const retry = await promptInt(ask, "Retry? (1 = yes, 2 = no): ", [1, 2], print);
      if (retry === 1) continue;
      return "stop";
    }

    if (mode === "single") {
      print("\nSession complete.");
      print("1. Back to the menu");
      print("2. Stop");
      return (await promptInt(ask, "Enter your choice (1-2): ", [1, 2], print)) === 1 ? "menu" : "stop";
    }

    log.info(`Next session in ${hours} hour(s). Press Ctrl+C for options.`);
    try {
      await wait(hours * HOUR_MS);
    } catch (error) {
      if (!(error instanceof OperatorInterrupt)) throw error;

      print("\nInterrupted.");
      print("1. Resume now");
      print("2. Back to the menu");
      print("3. Stop");
      const choice = await promptInt(ask, "Enter your choice (1-3): ", [1, 2, 3], print);
      if (choice === 2) return "menu";
      if (choice === 3) return "stop";
    }
  }
}
