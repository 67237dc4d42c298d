import { Inject, Injectable } from "@nestjs/common";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import { isRunPollingStatus, type RunStatus } from "@foundry-console/types";
import type { Logger } from "pino";
import { FoundryClient } from "../foundry/foundry.client";
import type { FoundryRun } from "../foundry/foundry.types";

export const RUN_SLEEP = Symbol("RUN_POLL_SLEEP");

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RunPollTimeoutError extends Error {
  constructor(
    readonly runId: string,
    readonly lastStatus: RunStatus,
    readonly timeoutMs: number,
  ) {
    super(`Run ${runId} did not finish within ${timeoutMs} ms (last status: ${lastStatus})`);
    this.name = "RunPollTimeoutError";
  }
}

export class RunPollAbortedError extends Error {
  constructor(
    readonly runId: string,
    readonly lastStatus: RunStatus,
  ) {
    super(`Polling for run ${runId} was aborted (last status: ${lastStatus})`);
    this.name = "RunPollAbortedError";
  }
}

export interface PollOptions {
  signal?: AbortSignal;
  intervalMs?: number;
  /** Zero or less disables the deadline. */
  timeoutMs?: number;
}

/**
 * Re-fetches a run while it is queued, in progress or waiting for an action.
 * Any other status, including ones this code does not know, ends polling.
 */
@Injectable()
export class RunPoller {
  constructor(
    private readonly foundry: FoundryClient,
    @Inject(CONSOLE_SETTINGS) private readonly settings: ConsoleSettings,
    @Inject(RUN_SLEEP) private readonly sleep: Sleep,
    @InjectLogger("runs:poller") private readonly logger: Logger,
  ) {}

  async waitForTerminal(
    threadId: string,
    run: FoundryRun,
    options: PollOptions = {},
  ): Promise<FoundryRun> {
    const intervalMs = options.intervalMs ?? this.settings.runs.pollIntervalMs;
    const timeoutMs = options.timeoutMs ?? this.settings.runs.pollTimeoutMs;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : Number.POSITIVE_INFINITY;
    const { signal } = options;

    let current = run;
    while (isRunPollingStatus(current.status)) {
      if (signal?.aborted) {
        throw new RunPollAbortedError(current.id, current.status);
      }
      if (Date.now() + intervalMs > deadline) {
        throw new RunPollTimeoutError(current.id, current.status, timeoutMs);
      }

      try {
        await this.sleep(intervalMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new RunPollAbortedError(current.id, current.status);
        }
        throw error;
      }

      current = await this.foundry.getRun(threadId, current.id);
      this.logger.debug({ runId: current.id, status: current.status }, "Polled run");
    }

    return current;
  }
}
