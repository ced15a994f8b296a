/**
 * c2r-deploy Engine — Product Catalog
 *
 * The closed set of Click-to-Run editions this tool deploys, the channels it
 * targets, and the substitution rules that decide which installed edition a
 * requested one replaces.
 */

import { DeploymentError } from "./errors";
import { Channel, ProductId, ProductInfo, SubstitutionRule } from "./types";

export const PRODUCT_CATALOG: Record<ProductId, ProductInfo> = {
  O365ProPlusRetail: {
    id: "O365ProPlusRetail",
    name: "Office 365 ProPlus",
    family: "suite",
    tier: "retail-subscription",
    requires_key: false,
  },
  VisioStdXVolume: {
    id: "VisioStdXVolume",
    name: "Visio Standard (volume)",
    family: "visio",
    tier: "volume",
    requires_key: true,
  },
  VisioProXVolume: {
    id: "VisioProXVolume",
    name: "Visio Professional (volume)",
    family: "visio",
    tier: "volume",
    requires_key: true,
  },
  VisioProRetail: {
    id: "VisioProRetail",
    name: "Visio Online Plan 2",
    family: "visio",
    tier: "retail-subscription",
    requires_key: false,
  },
  ProjectStdXVolume: {
    id: "ProjectStdXVolume",
    name: "Project Standard (volume)",
    family: "project",
    tier: "volume",
    requires_key: true,
  },
  ProjectProXVolume: {
    id: "ProjectProXVolume",
    name: "Project Professional (volume)",
    family: "project",
    tier: "volume",
    requires_key: true,
  },
  ProjectProRetail: {
    id: "ProjectProRetail",
    name: "Project Online Desktop Client",
    family: "project",
    tier: "retail-subscription",
    requires_key: false,
  },
};

export const PRODUCT_IDS: readonly ProductId[] = [
  "O365ProPlusRetail",
  "VisioStdXVolume",
  "VisioProXVolume",
  "VisioProRetail",
  "ProjectStdXVolume",
  "ProjectProXVolume",
  "ProjectProRetail",
];

/**
 * Installed edition → requested edition pairs. When the requested edition is
 * a rule's target and its source is installed, the source is dropped.
 *
 * Project has no retail → volume rule; that direction is left as it is.
 */
export const SUBSTITUTION_RULES: readonly SubstitutionRule[] = [
  { source: "VisioStdXVolume", target: "VisioProRetail" },
  { source: "VisioProXVolume", target: "VisioProRetail" },
  { source: "ProjectStdXVolume", target: "ProjectProRetail" },
  { source: "ProjectProXVolume", target: "ProjectProRetail" },
  { source: "VisioStdXVolume", target: "VisioProXVolume" },
  { source: "VisioProXVolume", target: "VisioStdXVolume" },
  { source: "ProjectStdXVolume", target: "ProjectProXVolume" },
  { source: "ProjectProXVolume", target: "ProjectStdXVolume" },
  { source: "VisioProRetail", target: "VisioStdXVolume" },
  { source: "VisioProRetail", target: "VisioProXVolume" },
];

export function isProductId(value: string): value is ProductId {
  return Object.prototype.hasOwnProperty.call(PRODUCT_CATALOG, value);
}

/**
 * Parse a product id typed by a user. Matching is case-insensitive, the
 * canonical spelling is returned.
 *
 * @throws DeploymentError (VALIDATION_ERROR) if the id is not in the catalog
 */
export function parseProductId(input: string): ProductId {
  const trimmed = input.trim();
  const match = PRODUCT_IDS.find(
    (id) => id.toLowerCase() === trimmed.toLowerCase(),
  );
  if (!match) {
    throw new DeploymentError(
      "VALIDATION_ERROR",
      `Unknown product "${input}". ` +
        `Supported products: ${PRODUCT_IDS.join(", ")}`,
      { product: input },
    );
  }
  return match;
}

export function getProduct(id: ProductId): ProductInfo {
  return PRODUCT_CATALOG[id];
}

// ─── Channels ────────────────────────────────────────────────────

/** CDN base URL the Click-to-Run service records for each channel */
export const CHANNEL_CDN_URLS: Record<Channel, string> = {
  Current:
    "http://officecdn.microsoft.com/pr/492350f6-3a01-4f97-b9c0-c7c6ddf67d60",
  Deferred:
    "http://officecdn.microsoft.com/pr/7ffbc6bf-bc32-4f92-8982-f9dd17fd3114",
  FirstReleaseCurrent:
    "http://officecdn.microsoft.com/pr/64256afe-f5d9-4f86-8936-8840a6a4f5be",
  FirstReleaseDeferred:
    "http://officecdn.microsoft.com/pr/b8f9b850-328d-4355-9145-c59439a0c4cf",
};

export const CHANNELS: readonly Channel[] = [
  "Current",
  "Deferred",
  "FirstReleaseCurrent",
  "FirstReleaseDeferred",
];

export function isChannel(value: string): value is Channel {
  return Object.prototype.hasOwnProperty.call(CHANNEL_CDN_URLS, value);
}

/**
 * Map a recorded CDN base URL to its channel. The comparison ignores the
 * scheme, letter case and trailing slashes.
 */
export function channelFromCdnUrl(url: string): Channel | "unknown" {
  const normalize = (u: string) =>
    u.trim().toLowerCase().replace(/^https?:\/\//, "").replace(/\/+$/, "");
  const wanted = normalize(url);
  const match = CHANNELS.find(
    (channel) => normalize(CHANNEL_CDN_URLS[channel]) === wanted,
  );
  return match ?? "unknown";
}
