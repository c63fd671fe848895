/**
 * Strict mode: off by default, verifies tryAssumeCurrent when on.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { IsolationDomain, IsolationViolation, enableStrictMode } from "isolane";
import { disableStrictMode, isStrictModeEnabled } from "../src/strict-mode.js";

afterEach(() => {
  disableStrictMode();
  vi.restoreAllMocks();
});

describe("strict mode off by default", () => {
  it("trusts tryAssumeCurrent without warning", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const domain = new IsolationDomain("trusted");
    const cell = domain.own(1);
    expect(isStrictModeEnabled()).toBe(false);
    expect(domain.tryAssumeCurrent(() => cell.value)).toBe(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

describe("strict mode on", () => {
  it("rejects a false claim before the work runs and reports it", () => {
    const warnings: string[] = [];
    enableStrictMode({ onWarn: (message) => warnings.push(message) });
    const domain = new IsolationDomain("checked");
    let ran = false;
    expect(() =>
      domain.tryAssumeCurrent(() => {
        ran = true;
      }),
    ).toThrow(IsolationViolation);
    expect(ran).toBe(false);
    expect(warnings).toEqual([
      `tryAssumeCurrent on domain "checked" from another context (expected domain "checked"#${domain.id}, running on nonisolated)`,
    ]);
  });

  it("accepts a true claim", async () => {
    const warnings: string[] = [];
    enableStrictMode({ onWarn: (message) => warnings.push(message) });
    const domain = new IsolationDomain("honest");
    await expect(domain.enter(() => domain.tryAssumeCurrent(() => "ok"))).resolves.toBe("ok");
    expect(warnings).toEqual([]);
  });

  it("warns on the console without onWarn", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    enableStrictMode();
    const domain = new IsolationDomain("loud");
    expect(() => domain.tryAssumeCurrent(() => 1)).toThrow(IsolationViolation);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
