import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { getHelpText, parseCliArgs, resolveConfig } from "./index";

describe("parseCliArgs", () => {
  it("returns help for unknown commands and -h", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["deploy"])).toBe("help");
    expect(parseCliArgs(["build", "--help"])).toBe("help");
  });

  it("parses build options", () => {
    expect(
      parseCliArgs([
        "build",
        "--src",
        "docs",
        "--repo",
        "acme/widgets",
        "--topics",
        "api, guides,",
        "--profile",
        "compact",
        "--concurrency",
        "3",
        "--prune",
      ]),
    ).toEqual({
      command: "build",
      configPath: undefined,
      sourceDir: "docs",
      repo: "acme/widgets",
      ref: "main",
      topics: ["api", "guides"],
      profile: "compact",
      outputDir: undefined,
      concurrency: 3,
      detailed: false,
      prune: true,
    });
  });

  it("drops an unknown profile and a flag in place of a value", () => {
    const parsed = parseCliArgs(["stats", "--profile", "huge", "--out", "--detailed"]);

    expect(parsed).not.toBe("help");
    if (parsed !== "help") {
      expect(parsed.profile).toBeUndefined();
      expect(parsed.outputDir).toBeUndefined();
      expect(parsed.detailed).toBe(true);
    }
  });
});

describe("resolveConfig", () => {
  it("lets flags override the environment", () => {
    const parsed = parseCliArgs(["build", "--out", "site-docs", "--profile", "lossless", "--prune"]);
    if (parsed === "help") {
      throw new Error("expected parsed arguments");
    }

    const config = resolveConfig(parsed, { DOCFORGE_OUTPUT_DIR: "env-docs", DOCFORGE_PROFILE: "compact" });

    expect(config.outputDir).toBe("site-docs");
    expect(config.profile).toBe("lossless");
    expect(config.pruneStale).toBe(true);
    expect(config.concurrency).toBe(DEFAULT_CONFIG.concurrency);
  });
});

describe("getHelpText", () => {
  it("names every command", () => {
    const help = getHelpText();
    expect(help.startsWith("Usage:\n  docforge <command> [options]")).toBe(true);
    for (const command of ["build --src", "serve", "stats"]) {
      expect(help).toContain(command);
    }
  });
});
