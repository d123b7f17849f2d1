import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { expandEnvVars, loadMcpConfig, parseMcpConfig } from "./mcp_config.ts";

const CONFIG = JSON.stringify({
  mcpServers: {
    files: { command: "files-server", args: ["--root", "${ROOT:-/data}"] },
    search: {
      type: "http",
      url: "${SEARCH_URL}",
      headers: { Authorization: "Bearer ${SEARCH_TOKEN}" },
    },
  },
});

const ENV = {
  SEARCH_URL: "http://localhost:9000/mcp",
  SEARCH_TOKEN: "test-secret",
};

describe("expandEnvVars", () => {
  it("expands variables in nested strings", () => {
    expect(expandEnvVars(
      { a: ["${A}", "x-${B:-fallback}-y"], n: 1, c: "${MISSING}" },
      { A: "one" },
    )).toEqual({ a: ["one", "x-fallback-y"], n: 1, c: "" });
  });

  it("prefers a set variable over its default", () => {
    expect(expandEnvVars("${A:-fallback}", { A: "set" })).toBe("set");
  });
});

describe("parseMcpConfig", () => {
  it("parses stdio and http servers", () => {
    expect(parseMcpConfig(CONFIG, ENV)).toEqual({
      files: { command: "files-server", args: ["--root", "/data"] },
      search: {
        type: "http",
        url: "http://localhost:9000/mcp",
        headers: { Authorization: "Bearer test-secret" },
      },
    });
  });

  it("treats a file without servers as empty", () => {
    expect(parseMcpConfig("{}", {})).toEqual({});
  });

  it("rejects servers without a command or url", () => {
    expect(() => parseMcpConfig('{"mcpServers":{"bad":{}}}', {})).toThrow();
  });
});

describe("loadMcpConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mcp-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads servers from a file", async () => {
    const path = join(dir, ".mcp.json");
    await writeFile(path, CONFIG);

    const servers = await loadMcpConfig(path, ENV);
    expect(Object.keys(servers)).toEqual(["files", "search"]);
  });

  it("yields no servers for a missing file", async () => {
    expect(await loadMcpConfig(join(dir, "missing.json"), ENV)).toEqual({});
  });

  it("yields no servers for an invalid file", async () => {
    const path = join(dir, ".mcp.json");
    await writeFile(path, "{ not json");
    expect(await loadMcpConfig(path, ENV)).toEqual({});
  });
});
