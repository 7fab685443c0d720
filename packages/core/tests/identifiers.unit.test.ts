import { describe, expect, it } from "vitest";
import { normalizeLabels, parseRepositoryId, RunnerNameSchema } from "@runnerctl/shared/lib/identifiers";
import { coerceTrimmedString, splitCsv } from "@runnerctl/shared/lib/strings";
import { detectGithubToken, isPlausibleTokenText, maskToken } from "@runnerctl/shared/lib/token-patterns";

describe("identifiers", () => {
  it("parses owner/repo", () => {
    expect(parseRepositoryId(" org/repo ")).toEqual({ owner: "org", repo: "repo", id: "org/repo" });
    expect(() => parseRepositoryId("org/..")).toThrow();
    expect(() => parseRepositoryId("org/repo/extra")).toThrow();
  });

  it("rejects runner names that look like pasted tokens", () => {
    expect(RunnerNameSchema.safeParse("runner-1").success).toBe(true);
    expect(RunnerNameSchema.safeParse("ghp_AAAAAAAAAAAA").success).toBe(false);
    expect(RunnerNameSchema.safeParse("-leading-dash").success).toBe(false);
  });

  it("dedupes and sorts labels", () => {
    expect(normalizeLabels(["self-hosted", "linux", "self-hosted", "x64"])).toEqual(["linux", "self-hosted", "x64"]);
    expect(() => normalizeLabels(["bad label"])).toThrow();
  });

  it("splits csv input", () => {
    expect(splitCsv("linux, x64,,gpu")).toEqual(["linux", "x64", "gpu"]);
    expect(coerceTrimmedString("  a  ")).toBe("a");
  });
});

describe("token patterns", () => {
  it("recognizes GitHub token families", () => {
    expect(detectGithubToken("ghp_AAAA")?.label).toBe("github personal access token");
    expect(detectGithubToken("github_pat_AAAA_BBBB")?.label).toBe("github fine-grained token");
    expect(detectGithubToken("custom-token")).toBeNull();
  });

  it("checks decoded tokens are printable single words", () => {
    expect(isPlausibleTokenText("ghp_AAAA")).toBe(true);
    expect(isPlausibleTokenText("")).toBe(false);
    expect(isPlausibleTokenText("two words")).toBe(false);
    expect(isPlausibleTokenText("\u0001abc")).toBe(false);
  });

  it("masks tokens", () => {
    expect(maskToken("ghp_AAAABBBBCCCCDDDD")).toBe("ghp_****DDDD");
    expect(maskToken("short")).toBe("****");
  });
});
