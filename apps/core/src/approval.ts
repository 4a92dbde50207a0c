import * as readline from "node:readline/promises";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";

export type ApprovalDecision =
  | { readonly kind: "approve" }
  | { readonly kind: "revise"; readonly feedback: string }
  | { readonly kind: "abandon" };

/** Asks a human (or a stand-in) to accept a candidate answer. */
export interface ApprovalGate {
  review(taskId: string, candidate: string): Promise<ApprovalDecision>;
  close(): void;
}

const APPROVE_WORDS = new Set(["", "approve", "approved", "yes", "y", "ok", "lgtm"]);
const ABANDON_WORDS = new Set(["abandon", "abort", "quit"]);
const REVISE_PREFIX = /^(reject|revise)\s*:\s*/i;

/** Interpret one line of operator input. Feedback text is kept exactly as typed. */
export function parseDecision(input: string): ApprovalDecision {
  const trimmed = input.trim();
  const word = trimmed.toLowerCase();
  if (APPROVE_WORDS.has(word)) return { kind: "approve" };
  if (ABANDON_WORDS.has(word)) return { kind: "abandon" };

  const prefix = REVISE_PREFIX.exec(trimmed);
  if (prefix) {
    const feedback = trimmed.slice(prefix[0].length);
    return { kind: "revise", feedback: feedback === "" ? msg.defaultRevisionFeedback : feedback };
  }
  return { kind: "revise", feedback: trimmed };
}

/** Prints the candidate and reads a single line from the terminal. */
export class TerminalApprovalGate implements ApprovalGate {
  private readonly rl: readline.Interface;

  constructor(
    private readonly logger: Logger,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
    terminal?: boolean,
  ) {
    this.rl = readline.createInterface({ input, output, terminal });
  }

  /** Ctrl+C at the prompt abandons the run. */
  async review(taskId: string, candidate: string): Promise<ApprovalDecision> {
    this.logger.info(msg.approvalHeader(taskId));
    this.logger.info(candidate);
    this.logger.info(msg.approvalFooter);

    const interrupt = new AbortController();
    const onSigint = () => interrupt.abort();
    this.rl.once("SIGINT", onSigint);
    try {
      const answer = await this.rl.question(msg.approvalPrompt, { signal: interrupt.signal });
      return parseDecision(answer);
    } catch (err) {
      if (!interrupt.signal.aborted) throw err;
      this.logger.warn(msg.approvalInterrupted(taskId));
      return { kind: "abandon" };
    } finally {
      this.rl.off("SIGINT", onSigint);
    }
  }

  close(): void {
    this.rl.close();
  }
}

export class AutoApprovalGate implements ApprovalGate {
  constructor(private readonly logger: Logger) {}

  async review(taskId: string): Promise<ApprovalDecision> {
    this.logger.info(msg.autoApproved(taskId));
    return { kind: "approve" };
  }

  close(): void {}
}

export function createApprovalGate(autoApprove: boolean, logger: Logger, interactive = Boolean(process.stdin.isTTY)): ApprovalGate {
  if (autoApprove) return new AutoApprovalGate(logger);
  if (!interactive) {
    logger.warn(msg.approvalNoTty);
    return new AutoApprovalGate(logger);
  }
  return new TerminalApprovalGate(logger);
}
