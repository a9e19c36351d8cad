import { describe, expect, it } from "vitest";
import { decodeProjectPath, matchesProjectFilter } from "./paths.js";

describe("decodeProjectPath", () => {
  it("turns the encoded name back into an absolute path", () => {
    expect(decodeProjectPath("-Users-richard-projects-foo")).toBe(
      "/Users/richard/projects/foo",
    );
  });

  it("returns names without the leading marker unchanged", () => {
    expect(decodeProjectPath("plain-name")).toBe("plain-name");
    expect(decodeProjectPath("")).toBe("");
  });

  it("is idempotent on passthrough inputs", () => {
    const once = decodeProjectPath("projects");
    expect(decodeProjectPath(once)).toBe(once);
  });

  it("decodes a lone marker to the root", () => {
    expect(decodeProjectPath("-")).toBe("/");
  });

  it("cannot recover hyphens that were part of a directory name", () => {
    expect(decodeProjectPath("-home-jane-my-app")).toBe("/home/jane/my/app");
  });
});

describe("matchesProjectFilter", () => {
  it("matches everything without a filter", () => {
    expect(matchesProjectFilter("/a/b", undefined)).toBe(true);
    expect(matchesProjectFilter("/a/b", "")).toBe(true);
  });

  it("uses plain substring containment", () => {
    expect(matchesProjectFilter("/Users/jane/projects/api", "projects/a")).toBe(true);
    expect(matchesProjectFilter("/Users/jane/projects/api", "web")).toBe(false);
  });
});
