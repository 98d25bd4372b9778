/**
 * Child process that runs one first-feasible search for `runSearchProcess`.
 *
 * Receives a single request over IPC and answers with a single response. The
 * parent kills the process once it has the answer or the budget runs out.
 */

import { SolverRequestSchema } from "../client.schemas.js";
import type { SolverResponse } from "../client.types.js";
import { searchFirst } from "./local-solver.js";

function answer(message: unknown): SolverResponse {
  try {
    return searchFirst(SolverRequestSchema.parse(message));
  } catch (error) {
    return { status: "ERROR", error: error instanceof Error ? error.message : String(error) };
  }
}

process.once("message", (message: unknown) => {
  process.send?.(answer(message));
});
