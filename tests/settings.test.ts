import { describe, expect, it } from "vitest";
import path from "path";
import { resolveSettings } from "../src/config/settings";
import { SettingsError } from "../src/errors";

const root = path.resolve("/repo");

describe("resolveSettings", () => {
  it("fills defaults relative to the root", () => {
    expect(resolveSettings({ rootDir: root }, {})).toEqual({
      rootDir: root,
      manifestPath: path.join(root, "sources.yaml"),
      adapterSourcePath: path.join(root, "crates", "rhof-adapters", "src", "lib.rs"),
      adapterTestsDir: path.join(root, "crates", "rhof-adapters", "tests"),
      testFileExtension: ".rs",
      manifestParser: "auto"
    });
  });

  it("reads the environment", () => {
    const settings = resolveSettings(
      {},
      {
        ADAPTER_CHECK_ROOT: root,
        ADAPTER_CHECK_MANIFEST: "config/sources.yaml",
        ADAPTER_CHECK_TEST_EXTENSION: ".test.ts",
        ADAPTER_CHECK_MANIFEST_PARSER: "line"
      }
    );
    expect(settings.rootDir).toBe(root);
    expect(settings.manifestPath).toBe(path.join(root, "config", "sources.yaml"));
    expect(settings.testFileExtension).toBe(".test.ts");
    expect(settings.manifestParser).toBe("line");
  });

  it("prefers explicit overrides to the environment", () => {
    const settings = resolveSettings(
      { rootDir: root, adapterTestsDir: "packages/adapters/test" },
      { ADAPTER_CHECK_TESTS_DIR: "ignored/tests", ADAPTER_CHECK_ROOT: "/elsewhere" }
    );
    expect(settings.rootDir).toBe(root);
    expect(settings.adapterTestsDir).toBe(path.join(root, "packages", "adapters", "test"));
  });

  it("ignores empty environment values", () => {
    const settings = resolveSettings({ rootDir: root }, { ADAPTER_CHECK_MANIFEST: "" });
    expect(settings.manifestPath).toBe(path.join(root, "sources.yaml"));
  });

  it("keeps absolute paths as they are", () => {
    const manifest = path.resolve("/etc/adapters/sources.yaml");
    const settings = resolveSettings({ rootDir: root, manifestPath: manifest }, {});
    expect(settings.manifestPath).toBe(manifest);
  });

  it("rejects an unknown manifest parser", () => {
    expect(() => resolveSettings({ rootDir: root, manifestParser: "toml" }, {})).toThrow(SettingsError);
    expect(() => resolveSettings({ rootDir: root, manifestParser: "toml" }, {})).toThrow(
      /^Invalid settings: manifestParser: /
    );
  });
});
