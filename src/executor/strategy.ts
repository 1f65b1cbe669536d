import { getConfig } from "../config.js";

/** Decides how many tasks may be in flight at once. */
export interface DispatchStrategy {
  readonly name: string;
  /** Free dispatch slots given the number of tasks already running. */
  slots(inFlight: number): number;
}

/** One task at a time: each handler call finishes before the next task is looked at. */
export const serialStrategy: DispatchStrategy = {
  name: "serial",
  slots: (inFlight) => (inFlight === 0 ? 1 : 0),
};

/** Up to `maxConcurrency` handler calls in flight. */
export function poolStrategy(maxConcurrency: number): DispatchStrategy {
  const cap = Math.max(1, Math.floor(maxConcurrency));
  return {
    name: `pool(${cap})`,
    slots: (inFlight) => Math.max(0, cap - inFlight),
  };
}

export function strategyFromConfig(): DispatchStrategy {
  const { strategy, maxConcurrency } = getConfig().executor;
  return strategy === "pool" ? poolStrategy(maxConcurrency) : serialStrategy;
}
