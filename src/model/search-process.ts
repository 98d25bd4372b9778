import { fork } from "node:child_process";
import { fileURLToPath } from "node:url";
import { SolverResponseSchema } from "../client.schemas.js";
import type { SolverRequest, SolverResponse } from "../client.types.js";

// Loaded from sources under tsx or Vitest, the worker is a .ts file too.
const fromSources = import.meta.url.endsWith(".ts");
const WORKER_PATH = fileURLToPath(
  new URL(fromSources ? "./search.worker.ts" : "./search.worker.js", import.meta.url),
);
const WORKER_EXEC_ARGV = fromSources ? ["--import", "tsx"] : [];

/**
 * Runs one first-feasible search in a child process and waits at most
 * `timeoutMs` for its answer.
 *
 * Resolves `undefined` when the budget runs out; the child is killed on every
 * path. Rejects with `signal.reason` when the signal aborts first, and when
 * the child dies without answering.
 */
export function runSearchProcess(
  request: SolverRequest,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<SolverResponse | undefined> {
  return new Promise((resolve, reject) => {
    const child = fork(WORKER_PATH, [], {
      execArgv: WORKER_EXEC_ARGV,
      stdio: ["ignore", "inherit", "inherit", "ipc"],
    });

    let settled = false;
    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      child.kill();
      settle();
    };

    const timer = setTimeout(() => finish(() => resolve(undefined)), timeoutMs);
    const onAbort = () => finish(() => reject(signal?.reason));
    signal?.addEventListener("abort", onAbort, { once: true });

    child.once("message", (message) => {
      const parsed = SolverResponseSchema.safeParse(message);
      finish(() => (parsed.success ? resolve(parsed.data) : reject(parsed.error)));
    });
    child.on("error", (error) => finish(() => reject(error)));
    child.once("exit", (code, exitSignal) => {
      finish(() =>
        reject(new Error(`Search process exited (${exitSignal ?? code}) before answering`)),
      );
    });

    child.send(request);
  });
}
