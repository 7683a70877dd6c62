/**
 * Advisor Context
 *
 * Per-invocation key/value bag shared by reference across the request and
 * response chains. It is created fresh for every call, seeded with the
 * caller's advisor parameters, and dropped when the call completes.
 *
 * Keys are not namespaced: a later writer overwrites an earlier writer's
 * value, so advisors should use keys unlikely to collide.
 */

import type { z } from "zod";
import { type AdvisorWarning, ConfigurationError } from "../errors";

export class AdvisorContext extends Map<string, unknown> {
  /** Degradations reported during this invocation */
  readonly warnings: AdvisorWarning[] = [];

  constructor(params: Record<string, unknown> = {}) {
    super(Object.entries(params));
  }

  /**
   * Record a degradation on the side channel of this invocation.
   */
  report(warning: AdvisorWarning): void {
    this.warnings.push(warning);
  }

  /**
   * Plain-object snapshot of the current entries.
   */
  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this);
  }
}

export function createAdvisorContext(params?: Record<string, unknown>): AdvisorContext {
  return new AdvisorContext(params);
}

/**
 * Read and validate a context value.
 * Returns undefined when the key is absent; throws a ConfigurationError when
 * the value is present but does not match `schema`.
 */
export function readParam<T extends z.ZodTypeAny>(
  context: AdvisorContext,
  key: string,
  schema: T,
  advisor: string
): z.output<T> | undefined {
  if (!context.has(key) || context.get(key) === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(context.get(key));
  if (!parsed.success) {
    throw new ConfigurationError("INVALID_PARAM", `Invalid advisor parameter "${key}"`, {
      advisor,
      details: {
        key,
        issues: parsed.error.issues.map((issue) => issue.message),
      },
    });
  }
  return parsed.data;
}
