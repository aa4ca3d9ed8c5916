import { ConfigurationError } from "../utils/errors";

export type LoadState = "load" | "domcontentloaded" | "networkidle";

export type WaitStrategy =
  | { kind: "state"; state: LoadState; timeoutMs: number }
  | { kind: "delay"; seconds: number; timeoutMs: number };

const STATE_TIMEOUT_MS = 90_000;
const DELAY_TIMEOUT_MS = 60_000;

const WAIT_MAP: Record<string, LoadState> = {
  load: "load",
  dom: "domcontentloaded",
  networkidle: "networkidle"
};

export function parseWaitStrategy(wait: string): WaitStrategy {
  const delay = /^(\d+)s$/.exec(wait);
  if (delay) {
    return { kind: "delay", seconds: Number(delay[1]), timeoutMs: DELAY_TIMEOUT_MS };
  }
  const state = WAIT_MAP[wait];
  if (!state) {
    throw new ConfigurationError(`Unknown wait strategy: ${wait}`);
  }
  return { kind: "state", state, timeoutMs: STATE_TIMEOUT_MS };
}
