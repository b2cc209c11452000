import { createLogger, type Logger } from "@/src/lib/logging/logger";
import { QuotaExhaustedError } from "./errors";
import { Mutex } from "./mutex";

export const RATE_WINDOW_MS = 60_000;
export const MAX_EXTRA_CREDENTIALS = 5;
export const MAX_CONSECUTIVE_GRANTS = 10;
const WAIT_BUFFER_MS = 100;

export type KeyPoolDeps = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
};

export type KeyPoolOptions = {
  default_credential: string | null;
  extra_credentials?: readonly string[];
  requests_per_minute: number;
};

export type KeyUsageSnapshot = {
  credential: string;
  requests_in_window: number;
  last_used_at: number | null;
  exhausted_until: number | null;
};

export type AcquireOptions = {
  /** Credentials already tried by the caller; preferred last. */
  avoid?: Iterable<string>;
};

type GrantStep = { kind: "granted"; credential: string } | { kind: "wait"; wait_ms: number };

type KeyUsageState = {
  credential: string;
  timestamps: number[];
  last_used_at: number | null;
  last_grant_seq: number;
  exhausted_until: number;
};

/**
 * Cleans the credential list: trims, drops blanks, removes duplicates of the
 * default and of each other, and keeps at most five extras. Returns a new
 * array with the default first.
 */
export function validateCredentials(
  defaultCredential: string | null,
  extras: readonly string[] = []
): string[] {
  const result: string[] = [];
  const seen = new Set<string>();
  const primary = defaultCredential?.trim() ?? "";
  if (primary) {
    result.push(primary);
    seen.add(primary);
  }

  let accepted = 0;
  for (const raw of extras) {
    if (accepted >= MAX_EXTRA_CREDENTIALS) break;
    const value = typeof raw === "string" ? raw.trim() : "";
    if (!value || seen.has(value)) continue;
    seen.add(value);
    result.push(value);
    accepted += 1;
  }
  return result;
}

export function maskCredential(credential: string) {
  if (credential.length <= 8) return "****";
  return `${credential.slice(0, 4)}...${credential.slice(-4)}`;
}

function defaultDeps(): KeyPoolDeps {
  return {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
    logger: createLogger("key_pool"),
  };
}

export class KeyPool {
  private readonly states: KeyUsageState[];
  private readonly rpm: number;
  private readonly deps: KeyPoolDeps;
  private readonly mutex = new Mutex();
  private lastGranted: string | null = null;
  private streak = 0;
  private grantSeq = 0;

  constructor(options: KeyPoolOptions, deps: Partial<KeyPoolDeps> = {}) {
    const credentials = validateCredentials(options.default_credential, options.extra_credentials ?? []);
    if (credentials.length === 0) {
      throw new Error("Key pool requires at least one non-blank credential.");
    }
    if (!Number.isInteger(options.requests_per_minute) || options.requests_per_minute < 1) {
      throw new Error(`Invalid requests_per_minute: ${options.requests_per_minute}`);
    }
    this.rpm = options.requests_per_minute;
    this.deps = { ...defaultDeps(), ...deps };
    this.states = credentials.map((credential) => ({
      credential,
      timestamps: [],
      last_used_at: null,
      last_grant_seq: 0,
      exhausted_until: 0,
    }));
    this.deps.logger.info(`initialized with ${credentials.length} credential(s), rpm=${this.rpm}`);
  }

  get size() {
    return this.states.length;
  }

  credentials(): string[] {
    return this.states.map((state) => state.credential);
  }

  /**
   * Grants a credential under its sliding-window budget. Waits (outside the
   * lock) while every usable credential is saturated; throws
   * QuotaExhaustedError when every credential has been marked exhausted for
   * the current window. Credentials in `avoid` are only granted when no other
   * credential has capacity.
   */
  async acquire(options: AcquireOptions = {}): Promise<string> {
    const avoid = new Set(options.avoid ?? []);
    for (;;) {
      const step = await this.mutex.runExclusive(() => this.tryGrant(avoid));
      if (step.kind === "granted") return step.credential;
      this.deps.logger.warn(`all credentials saturated (${this.rpm}/min), waiting ${step.wait_ms}ms`);
      await this.deps.sleep(step.wait_ms);
    }
  }

  private tryGrant(avoid: ReadonlySet<string>): GrantStep {
    const now = this.deps.now();
    this.prune(now);

    const usable = this.states.filter((state) => state.exhausted_until <= now);
    if (usable.length === 0) {
      throw new QuotaExhaustedError();
    }

    const withCapacity = usable.filter((state) => state.timestamps.length < this.rpm);
    if (withCapacity.length === 0) {
      const waitMs = Math.min(...usable.map((state) => state.timestamps[0] + RATE_WINDOW_MS - now)) + WAIT_BUFFER_MS;
      return { kind: "wait", wait_ms: Math.max(waitMs, 0) };
    }

    const chosen = this.choose(withCapacity, avoid);
    chosen.timestamps.push(now);
    chosen.last_used_at = now;
    this.grantSeq += 1;
    chosen.last_grant_seq = this.grantSeq;
    if (this.lastGranted === chosen.credential) {
      this.streak += 1;
    } else {
      this.lastGranted = chosen.credential;
      this.streak = 1;
    }
    return { kind: "granted", credential: chosen.credential };
  }

  /**
   * Reports the outcome of a call made with `credential`. A limited outcome
   * parks the credential until the current window passes.
   */
  async recordOutcome(credential: string, limited: boolean): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (!limited) return;
      const state = this.states.find((entry) => entry.credential === credential);
      if (!state) return;
      state.exhausted_until = this.deps.now() + RATE_WINDOW_MS;
      if (this.lastGranted === credential) {
        this.streak = 0;
        this.lastGranted = null;
      }
      this.deps.logger.warn(`credential ${maskCredential(credential)} rate limited; rotating`);
    });
  }

  snapshot(): KeyUsageSnapshot[] {
    const now = this.deps.now();
    return this.states.map((state) => ({
      credential: maskCredential(state.credential),
      requests_in_window: state.timestamps.filter((ts) => ts > now - RATE_WINDOW_MS).length,
      last_used_at: state.last_used_at,
      exhausted_until: state.exhausted_until > now ? state.exhausted_until : null,
    }));
  }

  private prune(now: number) {
    const cutoff = now - RATE_WINDOW_MS;
    for (const state of this.states) {
      while (state.timestamps.length > 0 && state.timestamps[0] <= cutoff) {
        state.timestamps.shift();
      }
    }
  }

  /**
   * Stays on the current credential until it is saturated, parked, or has had
   * MAX_CONSECUTIVE_GRANTS grants in a row; then moves to the least recently
   * granted credential with capacity. Avoided credentials are skipped while
   * any other one has capacity.
   */
  private choose(candidates: KeyUsageState[], avoid: ReadonlySet<string>): KeyUsageState {
    const fresh = candidates.filter((state) => !avoid.has(state.credential));
    const pool = fresh.length > 0 ? fresh : candidates;

    const current = pool.find((state) => state.credential === this.lastGranted);
    if (current && this.streak < MAX_CONSECUTIVE_GRANTS) return current;

    const others = pool
      .filter((state) => state !== current)
      .sort((a, b) => a.last_grant_seq - b.last_grant_seq);
    return others[0] ?? pool[0];
  }
}
