/**
 * c2r-deploy Engine — Configuration Document Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parseStringPromise } from "xml2js";
import {
  buildInstallConfiguration,
  buildUninstallConfiguration,
  renderConfiguration,
  writeConfiguration,
} from "../src/configuration";
import { DeploymentError } from "../src/errors";
import { parseSettings } from "../src/settings";

const TEST_DIR = path.join(os.tmpdir(), "c2r-deploy-configuration-test");

const settings = parseSettings(
  {
    language: "en-us",
    log_dir: path.join(TEST_DIR, "logs"),
    product_keys: {
      VisioStdXVolume: "AAAAA-BBBBB-CCCCC-DDDDD-EEEEE",
    },
  },
  {},
);

interface XmlNode {
  $?: Record<string, string>;
  [child: string]: unknown;
}

interface ParsedConfiguration {
  Configuration: Record<string, XmlNode[]>;
}

async function parse(xml: string): Promise<ParsedConfiguration> {
  return parseStringPromise(xml);
}

function products(node: XmlNode): XmlNode[] {
  const list = node.Product;
  return Array.isArray(list) ? list : [];
}

describe("buildInstallConfiguration", () => {
  it("maps the platform to the client edition", () => {
    const x64 = buildInstallConfiguration(
      ["O365ProPlusRetail"],
      { platform: "x64", channel: "Deferred" },
      settings,
    );
    const x86 = buildInstallConfiguration(
      ["O365ProPlusRetail"],
      { platform: "x86", channel: "Current" },
      settings,
    );
    expect(x64.client_edition).toBe("64");
    expect(x86.client_edition).toBe("32");
    expect(x86.channel).toBe("Current");
  });

  it("attaches keys to volume products only", () => {
    const doc = buildInstallConfiguration(
      ["VisioStdXVolume", "O365ProPlusRetail"],
      { platform: "x64", channel: "Deferred" },
      settings,
    );
    expect(doc.products).toEqual([
      {
        id: "VisioStdXVolume",
        pidkey: "AAAAA-BBBBB-CCCCC-DDDDD-EEEEE",
        language: "en-us",
      },
      { id: "O365ProPlusRetail", language: "en-us" },
    ]);
  });

  it("refuses a volume product without a key", () => {
    const build = () =>
      buildInstallConfiguration(
        ["ProjectProXVolume"],
        { platform: "x64", channel: "Deferred" },
        settings,
      );
    expect(build).toThrow(DeploymentError);
    expect(build).toThrow("ProjectProXVolume is a volume-licensed product");
  });
});

describe("renderConfiguration", () => {
  it("renders an Add document", async () => {
    const xml = renderConfiguration(
      buildInstallConfiguration(
        ["O365ProPlusRetail", "VisioStdXVolume"],
        { platform: "x64", channel: "Deferred" },
        settings,
      ),
    );
    expect(xml.startsWith("<Configuration>")).toBe(true);

    const parsed = await parse(xml);
    const add = parsed.Configuration.Add[0];
    expect(add.$).toEqual({ OfficeClientEdition: "64", Channel: "Deferred" });

    const items = products(add);
    expect(items.map((p) => p.$)).toEqual([
      { ID: "O365ProPlusRetail" },
      { ID: "VisioStdXVolume", PIDKEY: "AAAAA-BBBBB-CCCCC-DDDDD-EEEEE" },
    ]);
    expect(items[0].Language).toEqual([{ $: { ID: "en-us" } }]);

    expect(parsed.Configuration.Display[0].$).toEqual({
      Level: "None",
      AcceptEULA: "TRUE",
    });
    expect(parsed.Configuration.Logging[0].$).toEqual({
      Level: "Standard",
      Path: path.join(TEST_DIR, "logs"),
    });
    expect(parsed.Configuration.Property[0].$).toEqual({
      Name: "FORCEAPPSHUTDOWN",
      Value: "TRUE",
    });
    expect(parsed.Configuration.Remove).toBeUndefined();
  });

  it("adds SourcePath when configured", async () => {
    const local = parseSettings({ source_path: "\\\\server\\office" }, {});
    const xml = renderConfiguration(
      buildInstallConfiguration(
        ["O365ProPlusRetail"],
        { platform: "x86", channel: "Current" },
        local,
      ),
    );
    const parsed = await parse(xml);
    expect(parsed.Configuration.Add[0].$).toEqual({
      OfficeClientEdition: "32",
      Channel: "Current",
      SourcePath: "\\\\server\\office",
    });
  });

  it("renders a Remove document without All", async () => {
    const xml = renderConfiguration(
      buildUninstallConfiguration(["ProjectProXVolume"], settings),
    );
    const parsed = await parse(xml);
    const remove = parsed.Configuration.Remove[0];

    expect(remove.$).toBeUndefined();
    expect(products(remove).map((p) => p.$)).toEqual([{ ID: "ProjectProXVolume" }]);
    expect(parsed.Configuration.Add).toBeUndefined();
    expect(parsed.Configuration.Property[0].$?.Name).toBe("FORCEAPPSHUTDOWN");
  });
});

describe("writeConfiguration", () => {
  beforeEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("creates the parent directory", () => {
    const file = path.join(TEST_DIR, "nested", "configuration.xml");
    writeConfiguration(file, "<Configuration/>");
    expect(fs.readFileSync(file, "utf-8")).toBe("<Configuration/>");
  });

  it("replaces an existing document", () => {
    const file = path.join(TEST_DIR, "configuration.xml");
    writeConfiguration(file, "<Configuration><Add/></Configuration>");
    writeConfiguration(file, "<Configuration/>");
    expect(fs.readFileSync(file, "utf-8")).toBe("<Configuration/>");
  });
});
