import { catalogBudgets } from '@docweave/llm';

export const TRUNCATION_NOTICE =
  '\n\n[PROMPT TRUNCATED DUE TO RATE LIMITS - This is your final prompt, please provide your best response based on the available information.]';

export const DEFAULT_TOKENS_PER_MINUTE = 200000;
export const DEFAULT_WINDOW_MS = 60000;
export const DEFAULT_RESERVED_TOKENS = 50;

/**
 * Rough token count: one token per four characters, rounded up.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export type RateLimitWindow = {
  readonly tokensUsed: number;
  readonly windowStart: number;
  readonly requestCount: number;
};

/**
 * `remaining` is the budget left before this check was applied.
 */
export type RateLimitDecision = {
  readonly allowed: boolean;
  readonly remaining: number;
};

export type TruncationResult = {
  readonly prompt: string;
  readonly truncated: boolean;
};

export type RateLimiterOptions = {
  readonly budgets?: Readonly<Record<string, number>>;
  readonly defaultBudget?: number;
  readonly windowMs?: number;
  readonly reservedTokens?: number;
  readonly now?: () => number;
};

export type RateLimiter = {
  readonly estimate: (text: string) => number;
  readonly check: (model: string, estimatedTokens: number) => RateLimitDecision;
  readonly truncate: (prompt: string, maxTokens: number) => TruncationResult;
  readonly snapshot: (model: string) => RateLimitWindow | null;
  readonly reset: () => void;
};

type MutableWindow = {
  tokensUsed: number;
  windowStart: number;
  requestCount: number;
};

/**
 * Fixed-window token budgets per model. The whole budget is replenished once
 * the window reaches `windowMs`; there is no gradual leak.
 */
export function createRateLimiter(options: RateLimiterOptions = {}): RateLimiter {
  const budgets = options.budgets ?? catalogBudgets();
  const defaultBudget = options.defaultBudget ?? DEFAULT_TOKENS_PER_MINUTE;
  const windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
  const reservedTokens = options.reservedTokens ?? DEFAULT_RESERVED_TOKENS;
  const now = options.now ?? Date.now;

  const windows = new Map<string, MutableWindow>();

  function windowFor(model: string): MutableWindow {
    const existing = windows.get(model);
    if (existing) {
      return existing;
    }
    const created: MutableWindow = { tokensUsed: 0, windowStart: now(), requestCount: 0 };
    windows.set(model, created);
    return created;
  }

  // Read, compare and commit happen in one synchronous call, so concurrent
  // conversations on the event loop cannot interleave inside it.
  function check(model: string, estimatedTokens: number): RateLimitDecision {
    const window = windowFor(model);
    const current = now();

    if (current - window.windowStart >= windowMs) {
      window.tokensUsed = 0;
      window.windowStart = current;
      window.requestCount = 0;
    }

    const budget = budgets[model] ?? defaultBudget;
    const remaining = budget - window.tokensUsed;

    if (estimatedTokens > remaining) {
      return { allowed: false, remaining };
    }

    window.tokensUsed += estimatedTokens;
    window.requestCount += 1;
    return { allowed: true, remaining };
  }

  /**
   * Cuts `prompt` to fit `maxTokens` and appends the notice. The notice alone
   * estimates to 35 tokens, so the result fits only when `maxTokens >= 35`;
   * below that the result is the bare notice.
   */
  function truncate(prompt: string, maxTokens: number): TruncationResult {
    if (estimateTokens(prompt) <= maxTokens) {
      return { prompt, truncated: false };
    }

    const keepChars = Math.max(0, Math.floor((maxTokens - reservedTokens) * 4));
    return {
      prompt: prompt.substring(0, keepChars) + TRUNCATION_NOTICE,
      truncated: true,
    };
  }

  function snapshot(model: string): RateLimitWindow | null {
    const window = windows.get(model);
    return window ? { ...window } : null;
  }

  function reset(): void {
    windows.clear();
  }

  return {
    estimate: estimateTokens,
    check,
    truncate,
    snapshot,
    reset,
  };
}
