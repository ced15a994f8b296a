/**
 * c2r-deploy Engine — Edition Reconciler Tests
 */

import { describe, it, expect } from "vitest";
import { reconcile } from "../src/reconciler";
import { PRODUCT_IDS, SUBSTITUTION_RULES } from "../src/products";
import type {
  DeploymentTarget,
  InstalledInventory,
  ProductId,
} from "../src/types";

const TARGET: DeploymentTarget = { platform: "x64", channel: "Deferred" };

function inventory(
  products: ProductId[],
  overrides: Partial<InstalledInventory> = {},
): InstalledInventory {
  return {
    products,
    platform: products.length > 0 ? "x64" : undefined,
    channel: products.length > 0 ? "Deferred" : undefined,
    unrecognized: [],
    ...overrides,
  };
}

const NO_FLAGS = {
  platform_migration: false,
  channel_migration: false,
  product_migration: false,
};

describe("reconcile", () => {
  it("returns only the requested product on a fresh machine", () => {
    for (const requested of PRODUCT_IDS) {
      const result = reconcile(requested, inventory([]), TARGET);
      expect(result.target_set).toEqual([requested]);
      expect(result.applied_rules).toEqual([]);
      expect(result.flags).toEqual(NO_FLAGS);
    }
  });

  it("returns only the requested product when it is all that is installed", () => {
    for (const requested of PRODUCT_IDS) {
      const result = reconcile(requested, inventory([requested]), TARGET);
      expect(result.target_set).toEqual([requested]);
      expect(result.removed).toEqual([]);
      expect(result.flags).toEqual(NO_FLAGS);
    }
  });

  it("keeps unrelated installed products", () => {
    const result = reconcile(
      "VisioProRetail",
      inventory(["O365ProPlusRetail", "ProjectProXVolume"]),
      TARGET,
    );
    expect(result.target_set).toEqual([
      "VisioProRetail",
      "O365ProPlusRetail",
      "ProjectProXVolume",
    ]);
    expect(result.flags.product_migration).toBe(false);
  });

  it("replaces Visio Standard volume with Visio Pro retail", () => {
    const result = reconcile(
      "VisioProRetail",
      inventory(["VisioStdXVolume"]),
      TARGET,
    );
    expect(result.target_set).toEqual(["VisioProRetail"]);
    expect(result.removed).toEqual(["VisioStdXVolume"]);
    expect(result.applied_rules).toEqual([
      { source: "VisioStdXVolume", target: "VisioProRetail" },
    ]);
    expect(result.flags.product_migration).toBe(true);
  });

  it("replaces Project Standard volume with Project Pro retail", () => {
    const result = reconcile(
      "ProjectProRetail",
      inventory(["O365ProPlusRetail", "ProjectStdXVolume"]),
      TARGET,
    );
    expect(result.target_set).toEqual(["ProjectProRetail", "O365ProPlusRetail"]);
    expect(result.removed).toEqual(["ProjectStdXVolume"]);
    expect(result.flags.product_migration).toBe(true);
  });

  it("converts laterally between volume tiers", () => {
    const up = reconcile("VisioProXVolume", inventory(["VisioStdXVolume"]), TARGET);
    expect(up.target_set).toEqual(["VisioProXVolume"]);

    const down = reconcile(
      "ProjectStdXVolume",
      inventory(["ProjectProXVolume"]),
      TARGET,
    );
    expect(down.target_set).toEqual(["ProjectStdXVolume"]);
  });

  it("converts Visio retail back to either volume tier", () => {
    const std = reconcile("VisioStdXVolume", inventory(["VisioProRetail"]), TARGET);
    expect(std.target_set).toEqual(["VisioStdXVolume"]);

    const pro = reconcile("VisioProXVolume", inventory(["VisioProRetail"]), TARGET);
    expect(pro.target_set).toEqual(["VisioProXVolume"]);
  });

  it("keeps Project retail when a Project volume tier is requested", () => {
    const result = reconcile(
      "ProjectProXVolume",
      inventory(["ProjectProRetail"]),
      TARGET,
    );
    expect(result.target_set).toEqual(["ProjectProXVolume", "ProjectProRetail"]);
    expect(result.flags.product_migration).toBe(false);
  });

  it("fires several rules in one run", () => {
    const result = reconcile(
      "VisioProRetail",
      inventory(["VisioStdXVolume", "VisioProXVolume", "O365ProPlusRetail"]),
      TARGET,
    );
    expect(result.target_set).toEqual(["VisioProRetail", "O365ProPlusRetail"]);
    expect(result.removed).toEqual(["VisioStdXVolume", "VisioProXVolume"]);
    expect(result.applied_rules).toHaveLength(2);
  });

  it("never crosses families", () => {
    const result = reconcile(
      "ProjectProRetail",
      inventory(["VisioStdXVolume", "VisioProXVolume"]),
      TARGET,
    );
    expect(result.target_set).toEqual([
      "ProjectProRetail",
      "VisioStdXVolume",
      "VisioProXVolume",
    ]);
  });

  it("is idempotent", () => {
    const inv = inventory(["O365ProPlusRetail", "ProjectProXVolume"]);
    const first = reconcile("VisioProRetail", inv, TARGET);
    const second = reconcile("VisioProRetail", inv, TARGET);
    expect(second).toEqual(first);
  });

  it("yields the same set when the rules are applied in reverse", () => {
    const reversed = [...SUBSTITUTION_RULES].reverse();
    for (const requested of PRODUCT_IDS) {
      const inv = inventory([...PRODUCT_IDS]);
      const forward = reconcile(requested, inv, TARGET);
      const backward = reconcile(requested, inv, TARGET, reversed);
      expect([...backward.target_set].sort()).toEqual(
        [...forward.target_set].sort(),
      );
    }
  });

  it("flags a platform migration", () => {
    const result = reconcile(
      "O365ProPlusRetail",
      inventory(["O365ProPlusRetail"], { platform: "x86" }),
      TARGET,
    );
    expect(result.flags).toEqual({
      platform_migration: true,
      channel_migration: false,
      product_migration: false,
    });
    expect(result.target_set).toEqual(["O365ProPlusRetail"]);
  });

  it("flags a channel migration, including from an unknown channel", () => {
    const current = reconcile(
      "O365ProPlusRetail",
      inventory(["O365ProPlusRetail"], { channel: "Current" }),
      TARGET,
    );
    expect(current.flags.channel_migration).toBe(true);

    const unknown = reconcile(
      "O365ProPlusRetail",
      inventory(["O365ProPlusRetail"], { channel: "unknown" }),
      TARGET,
    );
    expect(unknown.flags.channel_migration).toBe(true);
  });

  it("flags a migration when the installed channel or platform is missing", () => {
    const noChannel = reconcile(
      "O365ProPlusRetail",
      inventory(["O365ProPlusRetail"], { channel: undefined }),
      TARGET,
    );
    expect(noChannel.flags).toEqual({ ...NO_FLAGS, channel_migration: true });

    const noPlatform = reconcile(
      "O365ProPlusRetail",
      inventory(["O365ProPlusRetail"], { platform: undefined }),
      TARGET,
    );
    expect(noPlatform.flags).toEqual({ ...NO_FLAGS, platform_migration: true });
  });

  it("raises platform and channel migration together", () => {
    const result = reconcile(
      "VisioProRetail",
      inventory(["VisioStdXVolume"], { platform: "x86", channel: "Current" }),
      TARGET,
    );
    expect(result.flags).toEqual({
      platform_migration: true,
      channel_migration: true,
      product_migration: true,
    });
    expect(result.target_set).toEqual(["VisioProRetail"]);
  });
});

describe("SUBSTITUTION_RULES", () => {
  it("holds exactly ten directional rules", () => {
    expect(SUBSTITUTION_RULES).toHaveLength(10);
  });

  it("has no duplicate rule", () => {
    const keys = SUBSTITUTION_RULES.map((r) => `${r.source}->${r.target}`);
    expect(new Set(keys).size).toBe(keys.length);
  });
});
