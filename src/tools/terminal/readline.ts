import * as readline from "node:readline";
import type { Terminal } from "../../types/tools.js";
import { InputClosedError } from "../../errors.js";

interface PendingAnswer {
  resolve(line: string): void;
  reject(err: Error): void;
}

/**
 * One readline interface for the whole run, opened on the first question.
 * Lines that arrive before they are asked for are queued, so piped answers
 * are consumed one per question. Between questions input is paused, leaving
 * stdin to child processes started by command steps.
 */
export class ReadlineTerminal implements Terminal {
  private rl?: readline.Interface;
  private queued: string[] = [];
  private pending?: PendingAnswer;
  private ended = false;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  print(text: string): void {
    this.output.write(text + "\n");
  }

  ask(question: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
    const { signal } = opts;
    if (signal?.aborted) return Promise.reject(aborted());
    const rl = this.open();

    const line = this.queued.shift();
    if (line !== undefined) {
      this.output.write(question);
      return Promise.resolve(line);
    }
    if (this.ended) return Promise.reject(new InputClosedError());

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.pending = undefined;
        rl.pause();
        reject(aborted());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending = {
        resolve: (answer) => { signal?.removeEventListener("abort", onAbort); resolve(answer); },
        reject: (err) => { signal?.removeEventListener("abort", onAbort); reject(err); },
      };
      rl.setPrompt(question);
      rl.prompt();
    });
  }

  close(): void {
    if (!this.ended) this.rl?.close();
  }

  private open(): readline.Interface {
    if (this.rl) return this.rl;
    const rl = readline.createInterface({ input: this.input, output: this.output });
    rl.on("line", (line) => {
      const pending = this.pending;
      if (!pending) {
        this.queued.push(line);
        return;
      }
      this.pending = undefined;
      rl.pause();
      pending.resolve(line);
    });
    rl.on("close", () => {
      this.ended = true;
      const pending = this.pending;
      this.pending = undefined;
      pending?.reject(new InputClosedError());
    });
    // readline swallows ^C while it owns a TTY; hand it back to the process
    rl.on("SIGINT", () => { process.kill(process.pid, "SIGINT"); });
    this.rl = rl;
    return rl;
  }
}

function aborted(): DOMException {
  return new DOMException("The question was aborted", "AbortError");
}
