import { afterEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { hasTestReference, listAdapterTestFiles } from "../src/contract/testReference";
import { makeWorkspace, removeWorkspace, settingsFor } from "./helpers/workspace";

const TESTS_DIR = "crates/rhof-adapters/tests";

describe("hasTestReference", () => {
  const roots: string[] = [];

  async function workspace(files: Record<string, unknown>): Promise<string> {
    const root = await makeWorkspace(files);
    roots.push(root);
    return root;
  }

  afterEach(async () => {
    await Promise.all(roots.splice(0).map(removeWorkspace));
  });

  it("finds the identifier in the adapter source", async () => {
    const root = await workspace({});
    const adapterText = 'adapter_for_source("clickworker")';
    expect(await hasTestReference("clickworker", adapterText, settingsFor(root))).toBe(true);
  });

  it("finds the identifier in an adapter test file", async () => {
    const root = await workspace({
      [`${TESTS_DIR}/listing.rs`]: "fn parses() {}\n",
      [`${TESTS_DIR}/prolific_snapshot.rs`]: 'let id = "prolific";\n'
    });
    expect(await hasTestReference("prolific", "", settingsFor(root))).toBe(true);
  });

  it("ignores files with another extension", async () => {
    const root = await workspace({ [`${TESTS_DIR}/notes.md`]: "prolific" });
    expect(await hasTestReference("prolific", "", settingsFor(root))).toBe(false);
  });

  it("uses the configured test extension", async () => {
    const root = await workspace({ [`${TESTS_DIR}/prolific.test.ts`]: 'it("prolific")' });
    const settings = settingsFor(root, { testFileExtension: ".test.ts" });
    expect(await hasTestReference("prolific", "", settings)).toBe(true);
  });

  it("follows symlinked test files", async () => {
    const root = await workspace({
      "shared/demo_snapshot.rs": 'let id = "demo";\n',
      [`${TESTS_DIR}/listing.rs`]: "fn parses() {}\n"
    });
    await fs.symlink(
      path.join(root, "shared", "demo_snapshot.rs"),
      path.join(root, TESTS_DIR, "demo.rs")
    );

    expect(await hasTestReference("demo", "", settingsFor(root))).toBe(true);
  });

  it("skips symlinks that point nowhere", async () => {
    const root = await workspace({ [`${TESTS_DIR}/listing.rs`]: "fn parses() {}\n" });
    await fs.symlink(path.join(root, "missing.rs"), path.join(root, TESTS_DIR, "demo.rs"));

    const files = await listAdapterTestFiles(settingsFor(root));

    expect(files.map((file) => path.basename(file))).toEqual(["listing.rs"]);
    expect(await hasTestReference("demo", "", settingsFor(root))).toBe(false);
  });

  it("does not search nested directories", async () => {
    const root = await workspace({ [`${TESTS_DIR}/nested/prolific.rs`]: "prolific" });
    expect(await hasTestReference("prolific", "", settingsFor(root))).toBe(false);
  });

  it("returns false when the test directory does not exist", async () => {
    const root = await workspace({});
    expect(await hasTestReference("prolific", "", settingsFor(root))).toBe(false);
  });

  it("matches the identifier inside a longer one", async () => {
    const root = await workspace({});
    expect(await hasTestReference("demo", 'source_id: "demo2"', settingsFor(root))).toBe(true);
  });

  it("lists test files in name order", async () => {
    const root = await workspace({
      [`${TESTS_DIR}/b.rs`]: "",
      [`${TESTS_DIR}/a.rs`]: "",
      [`${TESTS_DIR}/c.txt`]: ""
    });
    const files = await listAdapterTestFiles(settingsFor(root));
    expect(files.map((file) => file.slice(root.length))).toEqual([
      `/${TESTS_DIR}/a.rs`,
      `/${TESTS_DIR}/b.rs`
    ]);
  });
});
