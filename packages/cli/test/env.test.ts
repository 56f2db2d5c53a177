/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_INDEX_DIR, expandTilde, isVerbose, resolveIndexDir, setVerbose } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveIndexDir", () => {
    it("should use the CLI option when provided", () => {
      expect(resolveIndexDir("/cli/path", { TOPICSEARCH_INDEX_DIR: "/env/path" })).toBe("/cli/path");
    });

    it("should use TOPICSEARCH_INDEX_DIR when the option is absent", () => {
      expect(resolveIndexDir(undefined, { TOPICSEARCH_INDEX_DIR: "/env/path" })).toBe("/env/path");
    });

    it("should ignore an empty TOPICSEARCH_INDEX_DIR", () => {
      expect(resolveIndexDir(undefined, { TOPICSEARCH_INDEX_DIR: "" })).toBe(DEFAULT_INDEX_DIR);
    });

    it("should default to /tmp/topicsearch_index", () => {
      expect(resolveIndexDir(undefined, {})).toBe("/tmp/topicsearch_index");
    });

    it("should resolve relative paths against the working directory", () => {
      expect(resolveIndexDir("./my-index", {})).toBe(path.resolve("my-index"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveIndexDir("~/indexes/topics", {})).toBe(path.join(homedir(), "indexes/topics"));
    });
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("/abs/~x")).toBe("/abs/~x");
      expect(expandTilde("~someone/dir")).toBe("~someone/dir");
    });
  });

  describe("isVerbose", () => {
    afterEach(() => {
      setVerbose(false);
    });

    it("should follow --verbose", () => {
      setVerbose(true);
      expect(isVerbose()).toBe(true);
    });
  });
});
