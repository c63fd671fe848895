/**
 * IsolationContext: which domain, if any, a unit of work runs on.
 * Resolved at call time; a tagged value, never a subtype relationship.
 */

import { storage } from "./async-context.js";
import type { IsolationDomain } from "./domain.js";

export type IsolationContext =
  | { readonly kind: "none" }
  | { readonly kind: "bound"; readonly domain: IsolationDomain };

/** No isolation: runs on the caller's thread of control with no exclusivity guarantee. */
export const nonisolated: IsolationContext = Object.freeze({ kind: "none" });

export function bound(domain: IsolationDomain): IsolationContext {
  return { kind: "bound", domain };
}

/** Isolation of the code that is running now; `nonisolated` outside any domain. */
export function currentIsolation(): IsolationContext {
  return storage.getStore()?.isolation ?? nonisolated;
}

/** The domain of a context, or undefined for `nonisolated`. */
export function domainOf(ctx: IsolationContext): IsolationDomain | undefined {
  return ctx.kind === "bound" ? ctx.domain : undefined;
}

export function sameIsolation(a: IsolationContext, b: IsolationContext): boolean {
  return domainOf(a) === domainOf(b);
}

export function describeIsolation(ctx: IsolationContext): string {
  return ctx.kind === "bound" ? `domain "${ctx.domain.name}"#${ctx.domain.id}` : "nonisolated";
}

/**
 * Anything that can tell callers which isolation its behaviors expect, e.g. a
 * domain-bound service handed out behind an interface.
 */
export interface IsolationProvider {
  readonly isolation: IsolationContext;
}
