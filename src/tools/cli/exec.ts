import { spawn } from "node:child_process";
import type { CommandRunner, CommandResult } from "../../types/tools.js";

/**
 * Runs commands as child processes sharing our stdio, so interactive tools work.
 * A command that cannot be started (ENOENT, EACCES, ...) is a failed result, not an error;
 * an abort through the signal rejects so the caller can tell an interrupt from a failure,
 * also when the child already exited on the same ^C.
 */
export const spawnRunner: CommandRunner = {
  run(argv, opts = {}) {
    const [file, ...args] = argv;
    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(file, args, { stdio: "inherit", signal: opts.signal });
      child.once("error", (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (err.name === "AbortError") reject(err);
        else resolve({ ok: false, exit_code: null, error: err.code ?? err.message });
      });
      child.once("close", (code, signal) => {
        if (settled) return;
        settled = true;
        const finish = () => {
          if (opts.signal?.aborted) reject(new DOMException("The command was aborted", "AbortError"));
          else resolve({ ok: code === 0, exit_code: code });
        };
        // A ^C at the terminal reaches the child too; let our own SIGINT handler abort first.
        if (signal === "SIGINT" && opts.signal) setImmediate(finish);
        else finish();
      });
    });
  }
};
