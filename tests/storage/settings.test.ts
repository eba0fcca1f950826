/**
 * Settings & Secrets Persistence Tests
 */

import fs from "node:fs";
import { describe, it, expect } from "vitest";
import { SettingsStore } from "../../src/storage/settings.js";
import { SecretsStore } from "../../src/storage/secrets.js";
import { tempDir } from "../support/brokerage.js";

describe("SettingsStore", () => {
  it("should start from defaults when no file exists", () => {
    const store = new SettingsStore(tempDir());
    expect(store.assets()).toEqual([]);
    expect(store.current.calculator).toEqual({
      risk: 0.3,
      riskFree: 0,
      riskMode: "std",
      stopLossStd: 2,
      stopLossMaxPercent: 0.2,
    });
  });

  it("should add an asset once and persist it", () => {
    const dir = tempDir();
    const store = new SettingsStore(dir);
    expect(store.addAsset({ id: "332111", name: "Acme" })).toBe(true);
    expect(store.addAsset({ id: "332111" })).toBe(false);

    expect(new SettingsStore(dir).assets()).toEqual([{ id: "332111", name: "Acme" }]);
  });

  it("should move a deleted asset to the disabled list", () => {
    const store = new SettingsStore(tempDir());
    store.addAsset({ id: "332111" });

    expect(store.deleteAsset("332111")).toBe(true);
    expect(store.deleteAsset("332111")).toBe(false);
    expect(store.assets()).toEqual([]);
    expect(store.current.disabledAssets).toEqual([{ id: "332111" }]);
  });

  it("should re-enable a disabled asset that is added again", () => {
    const store = new SettingsStore(tempDir());
    store.addAsset({ id: "332111" });
    store.deleteAsset("332111");
    store.addAsset({ id: "332111" });

    expect(store.assets()).toEqual([{ id: "332111" }]);
    expect(store.current.disabledAssets).toEqual([]);
  });

  it("should fall back to defaults on a corrupt file", () => {
    const dir = tempDir();
    const store = new SettingsStore(dir);
    fs.writeFileSync(store.file, "{not json", "utf-8");
    expect(new SettingsStore(dir).assets()).toEqual([]);
  });
});

describe("SecretsStore", () => {
  it("should round-trip the session and restrict the file to its owner", () => {
    const dir = tempDir();
    const secrets = new SecretsStore(dir);
    secrets.save({ sessionToken: "test-session", userToken: 7, cookies: { JSESSIONID: "test-session" } });

    expect(new SecretsStore(dir).load()).toEqual({
      sessionToken: "test-session",
      userToken: 7,
      cookies: { JSESSIONID: "test-session" },
    });
    expect(fs.statSync(secrets.file).mode & 0o777).toBe(0o600);
  });

  it("should start fresh when the file is missing or unreadable", () => {
    const dir = tempDir();
    const secrets = new SecretsStore(dir);
    expect(secrets.load()).toEqual({ cookies: {} });
    fs.writeFileSync(secrets.file, "[]", "utf-8");
    expect(secrets.load()).toEqual({ cookies: {} });
  });
});
