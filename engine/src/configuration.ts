/**
 * c2r-deploy Engine — Office Deployment Tool Configuration
 *
 * Builds the configuration document consumed by `setup.exe /configure`.
 *
 * Install:
 *   <Configuration>
 *     <Add OfficeClientEdition="64" Channel="Deferred">
 *       <Product ID="O365ProPlusRetail"><Language ID="MatchOS"/></Product>
 *       <Product ID="VisioStdXVolume" PIDKEY="..."><Language ID="MatchOS"/></Product>
 *     </Add>
 *     <Display Level="None" AcceptEULA="TRUE"/>
 *     <Logging Level="Standard" Path="..."/>
 *     <Property Name="FORCEAPPSHUTDOWN" Value="TRUE"/>
 *   </Configuration>
 *
 * Uninstall uses <Remove> with the requested products (never All="TRUE").
 */

import * as fs from "fs";
import * as path from "path";
import { Builder } from "xml2js";
import { DeploymentError } from "./errors";
import { getProduct } from "./products";
import { DeploymentSettings } from "./settings";
import { Channel, DeploymentTarget, ProductId } from "./types";

export interface ConfigurationProduct {
  id: ProductId;
  pidkey?: string;
  language: string;
}

export interface ConfigurationDocument {
  action: "Add" | "Remove";
  /** Add only */
  client_edition?: "32" | "64";
  /** Add only */
  channel?: Channel;
  source_path?: string;
  products: ConfigurationProduct[];
  display: { level: "None" | "Full"; accept_eula: boolean };
  logging: { level: "Off" | "Standard"; path: string };
  force_app_shutdown: boolean;
}

type ConfigurationSettings = Pick<
  DeploymentSettings,
  | "language"
  | "source_path"
  | "product_keys"
  | "display"
  | "logging"
  | "force_app_shutdown"
>;

function toProduct(
  id: ProductId,
  settings: ConfigurationSettings,
): ConfigurationProduct {
  const product: ConfigurationProduct = { id, language: settings.language };
  if (getProduct(id).requires_key) {
    const key = settings.product_keys[id];
    if (!key) {
      throw new DeploymentError(
        "CONFIGURATION_ERROR",
        `${id} is a volume-licensed product and needs a product key. ` +
          `Add it under product_keys in the deployment settings.`,
        { product: id },
      );
    }
    product.pidkey = key;
  }
  return product;
}

/**
 * @throws DeploymentError (CONFIGURATION_ERROR) when a volume product has
 *   no configured key
 */
export function buildInstallConfiguration(
  products: ProductId[],
  target: DeploymentTarget,
  settings: ConfigurationSettings,
): ConfigurationDocument {
  return {
    action: "Add",
    client_edition: target.platform === "x64" ? "64" : "32",
    channel: target.channel,
    source_path: settings.source_path,
    products: products.map((id) => toProduct(id, settings)),
    display: { ...settings.display },
    logging: { ...settings.logging },
    force_app_shutdown: settings.force_app_shutdown,
  };
}

/**
 * Removal needs no product keys.
 */
export function buildUninstallConfiguration(
  products: ProductId[],
  settings: ConfigurationSettings,
): ConfigurationDocument {
  return {
    action: "Remove",
    products: products.map((id) => ({ id, language: settings.language })),
    display: { ...settings.display },
    logging: { ...settings.logging },
    force_app_shutdown: settings.force_app_shutdown,
  };
}

const bool = (value: boolean) => (value ? "TRUE" : "FALSE");

export function renderConfiguration(doc: ConfigurationDocument): string {
  const actionAttrs: Record<string, string> = {};
  if (doc.client_edition) actionAttrs.OfficeClientEdition = doc.client_edition;
  if (doc.channel) actionAttrs.Channel = doc.channel;
  if (doc.source_path) actionAttrs.SourcePath = doc.source_path;

  const products = doc.products.map((p) => {
    const attrs: Record<string, string> = { ID: p.id };
    if (p.pidkey) attrs.PIDKEY = p.pidkey;
    return { $: attrs, Language: { $: { ID: p.language } } };
  });

  const root = {
    Configuration: {
      [doc.action]: { $: actionAttrs, Product: products },
      Display: {
        $: { Level: doc.display.level, AcceptEULA: bool(doc.display.accept_eula) },
      },
      Logging: { $: { Level: doc.logging.level, Path: doc.logging.path } },
      Property: {
        $: { Name: "FORCEAPPSHUTDOWN", Value: bool(doc.force_app_shutdown) },
      },
    },
  };

  const builder = new Builder({
    headless: true,
    renderOpts: { pretty: true, indent: "  ", newline: "\n" },
  });
  return builder.buildObject(root);
}

/**
 * Replace the configuration file: any previous document is deleted first.
 */
export function writeConfiguration(filePath: string, xml: string): void {
  if (fs.existsSync(filePath)) {
    fs.unlinkSync(filePath);
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, xml, "utf-8");
}
