/**
 * c2r-deploy Engine — Edition Reconciler
 *
 * Computes the set of products to request from the Office Deployment Tool.
 *
 * The reconciler is additive: everything already installed is kept, except
 * editions that a substitution rule replaces with the requested one. Rules
 * only ever remove their own source from the set, so the order they are
 * applied in does not change the result.
 */

import { SUBSTITUTION_RULES } from "./products";
import {
  DeploymentTarget,
  InstalledInventory,
  MigrationFlags,
  ProductId,
  ReconcileResult,
  SubstitutionRule,
} from "./types";

/**
 * Platform and channel migrations only apply when there is something
 * installed to migrate. An installed platform or channel that cannot be
 * read (missing value, unrecognised CDN URL) never matches the target.
 */
export function computeMigrationFlags(
  inventory: InstalledInventory,
  target: DeploymentTarget,
  productMigration: boolean,
): MigrationFlags {
  const hasInstall = inventory.products.length > 0;
  return {
    platform_migration: hasInstall && inventory.platform !== target.platform,
    channel_migration: hasInstall && inventory.channel !== target.channel,
    product_migration: productMigration,
  };
}

export function reconcile(
  requested: ProductId,
  inventory: InstalledInventory,
  target: DeploymentTarget,
  rules: readonly SubstitutionRule[] = SUBSTITUTION_RULES,
): ReconcileResult {
  const installed = new Set(inventory.products);
  const targetSet: ProductId[] = [requested];

  for (const product of inventory.products) {
    if (product !== requested && !targetSet.includes(product)) {
      targetSet.push(product);
    }
  }

  const applied: SubstitutionRule[] = [];
  const removed: ProductId[] = [];

  for (const rule of rules) {
    if (rule.target !== requested || !installed.has(rule.source)) continue;

    applied.push(rule);
    const idx = targetSet.indexOf(rule.source);
    if (idx !== -1) {
      targetSet.splice(idx, 1);
      removed.push(rule.source);
    }
  }

  return {
    requested,
    target_set: targetSet,
    removed,
    applied_rules: applied,
    flags: computeMigrationFlags(inventory, target, applied.length > 0),
  };
}
