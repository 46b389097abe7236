/**
 * Caller-side wrapper that runs one optimization in a worker thread with
 * timeout and abort support. Abandoned runs are terminated, not awaited.
 */

import { Worker } from "node:worker_threads";
import {
  OPTIMIZER_WORKER_ROLE,
  type OptimizerRequest,
  type OptimizerResponse,
} from "./optimizer.worker.js";

export interface WorkerRunOptions {
  /** Reject and terminate the worker after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Override how the worker is spawned */
  createWorker?: () => Worker;
}

function spawnOptimizerWorker(): Worker {
  return new Worker(new URL("./optimizer.worker.js", import.meta.url), {
    workerData: { role: OPTIMIZER_WORKER_ROLE },
  });
}

export function runOptimizerInWorker(
  request: OptimizerRequest,
  options: WorkerRunOptions = {}
): Promise<OptimizerResponse> {
  const { timeoutMs, signal, createWorker = spawnOptimizerWorker } = options;

  return new Promise<OptimizerResponse>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("Optimization aborted"));
      return;
    }

    const worker = createWorker();
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      outcome();
      worker.terminate().catch((error: unknown) => {
        console.error("Failed to terminate optimizer worker:", error);
      });
    };

    const onAbort = () => finish(() => reject(new Error("Optimization aborted")));

    if (timeoutMs !== undefined) {
      timer = setTimeout(
        () => finish(() => reject(new Error(`Optimization timed out after ${timeoutMs} ms`))),
        timeoutMs
      );
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    worker.on("message", (response: OptimizerResponse) => finish(() => resolve(response)));
    worker.on("error", (error: Error) => {
      console.error("Optimizer worker error:", error);
      finish(() => reject(error));
    });
    worker.on("exit", (code: number) => {
      finish(() => reject(new Error(`Optimizer worker exited with code ${code} before responding`)));
    });

    try {
      worker.postMessage(request);
    } catch (error) {
      finish(() => reject(error));
    }
  });
}
