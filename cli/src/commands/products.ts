/**
 * c2r-deploy CLI - Products Command
 *
 * Lists the product editions this tool deploys and the substitution rules
 * applied when one edition replaces another.
 *
 * Usage:
 *   c2r-deploy products
 */

import { Command } from "commander";
import {
  getProduct,
  PRODUCT_CATALOG,
  PRODUCT_IDS,
  SUBSTITUTION_RULES,
} from "@c2r-deploy/engine";
import { colors, printBlank, printInfo, printTable, symbols } from "../output";

export function printProducts(): void {
  printInfo(`${colors.bold(String(PRODUCT_IDS.length))} products available:\n`);
  printTable({
    head: ["Product ID", "Name", "Family", "License", "Key"],
    rows: PRODUCT_IDS.map((id) => {
      const p = PRODUCT_CATALOG[id];
      return [
        colors.product(p.id),
        p.name,
        p.family,
        p.tier,
        p.requires_key ? "required" : colors.dim("-"),
      ];
    }),
  });
}

export function printRules(): void {
  printInfo("Installing the requested edition removes the installed one:\n");
  printTable({
    head: ["Installed", "", "Requested"],
    rows: SUBSTITUTION_RULES.map((rule) => [
      `${rule.source} ${colors.dim(`(${getProduct(rule.source).name})`)}`,
      symbols.arrow,
      colors.product(rule.target),
    ]),
  });
}

export function registerProductsCommand(program: Command): void {
  program
    .command("products")
    .description("List deployable Office products")
    .action(() => {
      printProducts();
      printBlank();
      printRules();
    });
}
