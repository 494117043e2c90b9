import { describe, expect, it } from "vitest";
import { plan, renderPlan } from "../src/commands/plan.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { CONFIG_DIR } from "./helpers/config.js";

describe("exit-codes", () => {
  it("defines all required exit codes", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, FAILED: 1, CANCELLED: 2, INVALID_CONFIG: 3 });
  });
});

describe("plan", () => {
  it("lists every entry with its release and namespace", async () => {
    const res = await plan({ configDir: CONFIG_DIR });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.plans.map((p) => [p.entry.id, p.release, p.namespace])).toEqual([
      ["install-v1-26", "example-chart-install-v1-26", "ct-install-v1-26"],
      ["install-v1-30", "example-chart-install-v1-30", "ct-install-v1-30"],
      ["install-v1-30-2", "example-chart-install-v1-30-2", "ct-install-v1-30-2"],
      ["upgrade-v1-29-stable", "example-chart-upgrade-v1-29-stable", "ct-upgrade-v1-29-stable"],
      ["upgrade-v1-29-dev", "example-chart-upgrade-v1-29-dev", "ct-upgrade-v1-29-dev"],
    ]);
  });

  it("renders the stage list with guard decisions", async () => {
    const res = await plan({ configDir: CONFIG_DIR, only: ["upgrade-v1-29-stable"] });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(renderPlan(res.plans[0], "human").split("\n")).toEqual([
      "upgrade-v1-29-stable: upgrade from stable on v1.29 (release example-chart-upgrade-v1-29-stable, namespace ct-upgrade-v1-29-stable)",
      "  run  provision-cluster          fatal",
      "  run  install-prerequisites      fatal",
      "  run  render                     fatal",
      "  run  lint                       fatal",
      "  run  lint-strict                tolerant",
      "  run  validate-against-api       fatal",
      "  run  install-prior-release      fatal",
      "  run  diff-against-local         fatal",
      "  run  await-prior-release-ready  fatal",
      "  run  await-prior-cert-acquired  fatal",
      "  skip apply-test-fixtures        fatal",
      "  run  install-local-chart        fatal",
      "  run  await-local-ready          fatal",
      "  run  await-local-cert-acquired  fatal",
      "  run  run-test-suite             fatal",
      "  run  collect-diagnostics        tolerant",
    ]);
  });

  it("marks the test suite tolerant for entries that accept failures", async () => {
    const res = await plan({ configDir: CONFIG_DIR, only: ["install-v1-26"] });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    const line: unknown = JSON.parse(renderPlan(res.plans[0], "jsonl"));
    expect(line).toMatchObject({ entry: "install-v1-26", scenario: "install", cluster_version: "v1.26" });
    expect(res.plans[0]?.stages.find((s) => s.name === "run-test-suite")).toEqual({
      name: "run-test-suite",
      kind: "run-tests",
      policy: "tolerant",
      applies: true,
    });
  });

  it("fails when the selection matches nothing", async () => {
    const res = await plan({ configDir: CONFIG_DIR, only: ["nightly-*"] });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors[0]?.code).toBe("NO_ENTRIES");
  });
});
