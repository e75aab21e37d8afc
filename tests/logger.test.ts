import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { parseRedactionDirectives, StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "evaluate.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3, silent: true });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("evaluate.log");
      expect(files).to.include("evaluate.log.1");
      expect(files).to.not.include("evaluate.log.3");

      const archived = await readFile(path.join(directory, "evaluate.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("scrubs configured secrets from answer excerpts", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "attempts.log");

    try {
      const logger = new StructuredLogger({ logFile, redactSecrets: ["test-secret"], silent: true });
      logger.logAttempt({
        instanceId: "bipartite/sparse/0",
        family: "bipartite",
        notation: "natural",
        correct: true,
        attempts: 1,
        rawText: "Using test-secret, the answer is yes",
      });
      await logger.flush();

      const [line] = (await readFile(logFile, "utf8")).trim().split("\n");
      const entry: unknown = JSON.parse(line);
      expect(entry).to.include({ level: "info", message: "attempt_scored" });
      expect(entry).to.have.nested.property("payload.excerpt", "Using [REDACTED], the answer is yes");
      expect(entry).to.have.nested.property("payload.failure", null);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("logs failed attempts as warnings with truncated excerpts", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ silent: true, onEntry: (entry) => entries.push(entry) });

    logger.logAttempt({
      instanceId: "tree-lca/tree/4",
      family: "tree-lca",
      notation: "dsl",
      correct: false,
      attempts: 3,
      failure: "no number found",
      rawText: "y".repeat(600),
    });

    expect(entries).to.have.length(1);
    expect(entries[0].level).to.equal("warn");
    expect(entries[0].payload).to.include({
      instance_id: "tree-lca/tree/4",
      correct: false,
      attempts: 3,
      failure: "no number found",
      excerpt: `${"y".repeat(512)}…`,
    });
  });

  it("masks sensitive keys when structured redaction is enabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ silent: true, redactionEnabled: true, onEntry: (entry) => entries.push(entry) });

    logger.info("client_configured", { endpoint: "local", token: "test-secret", headers: [{ Authorization: "test-secret" }] });

    expect(entries[0].payload).to.deep.equal({
      endpoint: "local",
      token: "[REDACTED]",
      headers: [{ Authorization: "[REDACTED]" }],
    });
  });

  it("omits file mirroring when no log file is configured", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const messages: string[] = [];
      const logger = new StructuredLogger({ logFile: null, silent: true, onEntry: (entry) => messages.push(entry.message) });

      logger.warn("no_file", { detail: "capture" });
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
      expect(messages).to.deep.equal(["no_file"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

describe("redaction directives", () => {
  it("separates toggles from literal secrets", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("off")).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on, test-secret")).to.deep.equal({ enabled: true, tokens: ["test-secret"] });
    expect(parseRedactionDirectives("test-secret,test-secret")).to.deep.equal({ enabled: true, tokens: ["test-secret"] });
    expect(parseRedactionDirectives("test-secret,off")).to.deep.equal({ enabled: false, tokens: ["test-secret"] });
  });
});
