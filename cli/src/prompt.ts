/**
 * c2r-deploy CLI — Interactive Prompts
 *
 * Setup closes every running Office application (FORCEAPPSHUTDOWN), so an
 * interactive deployment asks first.
 */

import * as readline from "readline";
import type { DeploymentType, ProductInfo } from "@c2r-deploy/engine";
import { colors, symbols } from "./output";

/** Applications closed by setup.exe while it runs */
export const CLOSED_APPLICATIONS = [
  "Word",
  "Excel",
  "PowerPoint",
  "Outlook",
  "OneNote",
  "Access",
  "Publisher",
  "Visio",
  "Project",
  "Skype for Business",
];

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Ask a yes/no question. Anything but "y" or "yes" is a no, and so is
 * end of input.
 */
export async function confirm(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<boolean> {
  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
  });

  try {
    const answer = await new Promise<string>((res) => {
      rl.once("close", () => res(""));
      rl.question(question, res);
    });
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

export function welcomeMessage(
  type: DeploymentType,
  product: ProductInfo,
): string {
  const verb = type === "install" ? "install" : "remove";
  return [
    "",
    `  This will ${verb} ${colors.product(product.name)}.`,
    "",
    "  The following applications will be closed if they are running:",
    ...CLOSED_APPLICATIONS.map((name) => `    ${symbols.bullet} ${name}`),
    "",
    "  Save your work before continuing.",
    "",
  ].join("\n");
}

export async function confirmDeployment(
  type: DeploymentType,
  product: ProductInfo,
  streams?: PromptStreams,
): Promise<boolean> {
  const output = streams?.output ?? process.stdout;
  output.write(welcomeMessage(type, product) + "\n");
  return confirm("  Continue? [y/N] ", streams);
}
