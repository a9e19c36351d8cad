import { randomBytes } from "node:crypto";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RecallConfigSchema } from "../config/schema.js";
import type { SessionInfo } from "../corpus/types.js";
import { BackendTimeoutError } from "../infra/errors.js";
import { type BackendClient, SemanticSearcher, contextName, subQueryText } from "./semantic-search.js";

interface ToolCall {
  name: string;
  args: Record<string, unknown>;
}

function text(value: unknown): unknown {
  return { content: [{ type: "text", text: typeof value === "string" ? value : JSON.stringify(value) }] };
}

class FakeBackend implements BackendClient {
  readonly calls: ToolCall[] = [];
  chunkCount: unknown = 2;
  responses: unknown[] = [{ response: "Discussed the login bug" }, { response: "" }];
  failOn = new Map<string, Error>();

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ name, args });
    const failure = this.failOn.get(name);
    if (failure) throw failure;
    switch (name) {
      case "rlm_inspect_context":
        return text({ chunk_count: this.chunkCount });
      case "rlm_sub_query_batch":
        return text({ results: this.responses });
      default:
        return text("ok");
    }
  }

  toolNames(): string[] {
    return this.calls.map((c) => c.name);
  }
}

const defaults = RecallConfigSchema.parse({});

describe("SemanticSearcher", () => {
  let root: string;
  let backend: FakeBackend;
  let searcher: SemanticSearcher;

  function candidate(id: string, content = '{"type":"user"}\n'): SessionInfo {
    const filePath = join(root, `${id}.jsonl`);
    writeFileSync(filePath, content);
    return {
      sessionId: id,
      projectPath: "/work/api",
      summary: "Fixed login bug",
      timestamp: "2026-05-01T10:00:00Z",
      file: { sessionId: id, filePath, size: content.length, mtimeMs: 0 },
    };
  }

  beforeEach(() => {
    root = join(tmpdir(), `recall-semantic-test-${randomBytes(8).toString("hex")}`);
    mkdirSync(root, { recursive: true });
    backend = new FakeBackend();
    searcher = new SemanticSearcher(backend, defaults.limits, defaults.semantic);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("loads, segments, inspects, queries and clears in order", async () => {
    const results = await searcher.searchSession(candidate("s1", "line one\n"), "login bug");

    expect(backend.toolNames()).toEqual([
      "rlm_load_context",
      "rlm_chunk_context",
      "rlm_inspect_context",
      "rlm_sub_query_batch",
      "rlm_clear_context",
    ]);
    expect(backend.calls[0]?.args).toEqual({ name: "session_s1", content: "line one\n" });
    expect(backend.calls[1]?.args).toEqual({ name: "session_s1", strategy: "lines", size: 100 });
    expect(backend.calls[3]?.args).toEqual({
      query: "Find information relevant to: login bug",
      context_name: "session_s1",
      chunk_indices: [0, 1],
      provider: "claude-sdk",
      model: "claude-haiku-4-5-20251101",
      concurrency: 2,
    });
    expect(results).toEqual([
      {
        session_id: "s1",
        project: "/work/api",
        summary: "Fixed login bug",
        timestamp: "2026-05-01T10:00:00Z",
        relevance: "semantic_match",
        excerpt: "Discussed the login bug",
      },
    ]);
  });

  it("caps the segments queried", async () => {
    backend.chunkCount = 12;
    await searcher.searchSession(candidate("s1"), "login");
    expect(backend.calls[3]?.args.chunk_indices).toEqual([0, 1, 2, 3, 4]);
  });

  it("queries a single segment when the count is unreadable", async () => {
    backend.chunkCount = "many";
    await searcher.searchSession(candidate("s1"), "login");
    expect(backend.calls[3]?.args.chunk_indices).toEqual([0]);
  });

  it("truncates long responses to the excerpt length", async () => {
    backend.responses = [{ response: "x".repeat(800) }];
    const [result] = await searcher.searchSession(candidate("s1"), "login");
    expect(result?.excerpt).toHaveLength(500);
  });

  it("does not split a surrogate pair at the excerpt boundary", async () => {
    backend.responses = [{ response: `${"a".repeat(499)}\u{1F600}tail` }];
    const [result] = await searcher.searchSession(candidate("s1"), "login");
    expect(result?.excerpt).toBe(`${"a".repeat(499)}\u{1F600}`);
  });

  it("clears the context when a backend call fails", async () => {
    backend.failOn.set("rlm_sub_query_batch", new BackendTimeoutError("tools/call", 120_000));

    await expect(searcher.searchSession(candidate("s1"), "login")).rejects.toBeInstanceOf(
      BackendTimeoutError,
    );
    expect(backend.toolNames().at(-1)).toBe("rlm_clear_context");
  });

  it("keeps the result when clearing fails", async () => {
    backend.failOn.set("rlm_clear_context", new Error("context busy"));
    const results = await searcher.searchSession(candidate("s1"), "login");
    expect(results).toHaveLength(1);
  });

  it("turns a failed candidate into an error entry and continues", async () => {
    const broken = candidate("broken");
    rmSync(broken.file.filePath);
    const healthy = candidate("healthy");

    const results = await searcher.searchCandidates([broken, healthy], "login");

    expect(results.map((r) => [r.session_id, r.relevance])).toEqual([
      ["broken", "error"],
      ["healthy", "semantic_match"],
    ]);
    expect(results[0]?.excerpt.startsWith("Error during semantic search: ENOENT")).toBe(true);
  });

  it("caps the error message in the placeholder excerpt", async () => {
    backend.failOn.set("rlm_load_context", new Error("e".repeat(300)));

    const [result] = await searcher.searchCandidates([candidate("s1")], "login");

    expect(result?.relevance).toBe("error");
    expect(result?.excerpt).toBe(`Error during semantic search: ${"e".repeat(100)}`);
  });

  it("treats a tool-level error as a failure", async () => {
    backend.callTool = async (name, args) => {
      backend.calls.push({ name, args });
      return name === "rlm_load_context"
        ? { content: [{ type: "text", text: "content too large" }], isError: true }
        : text("ok");
    };

    const [result] = await searcher.searchCandidates([candidate("s1")], "login");

    expect(result?.excerpt).toBe(
      'Error during semantic search: Backend call "rlm_load_context" failed: content too large',
    );
  });
});

describe("naming helpers", () => {
  it("derives backend names from the session and query", () => {
    expect(contextName("abc-123")).toBe("session_abc-123");
    expect(subQueryText("auth flow")).toBe("Find information relevant to: auth flow");
  });
});
