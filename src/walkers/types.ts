import type { PolicyRuntime } from "../fetch-policy.js";
import type { Logger } from "../logger.js";
import { sleep as defaultSleep } from "../retry.js";
import type { Sleep } from "../retry.js";
import type { RetrievalConfig, RetrievalOutcome, Transport, WalkStrategy } from "../types.js";

export interface WalkDependencies {
  transport: Transport;
  logger: Logger;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
  signal?: AbortSignal;
}

export interface CommentWalker {
  readonly strategy: WalkStrategy;
  walk(config: RetrievalConfig, deps: WalkDependencies): Promise<RetrievalOutcome>;
}

export function resolveRuntime(deps: WalkDependencies): PolicyRuntime {
  return {
    transport: deps.transport,
    logger: deps.logger,
    sleep: deps.sleep ?? defaultSleep,
    now: deps.now ?? (() => Date.now()),
    random: deps.random ?? Math.random,
    signal: deps.signal,
  };
}
